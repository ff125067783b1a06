export * from './bound'
export * from './domain'
export * from './interval'
export * from './parse'
