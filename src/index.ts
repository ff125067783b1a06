export * from './interval'
export type { Comparator } from './util'
export type { Option, OptionData } from './util/option'
export { OptionView } from './util/option'
export type { Result, ResultData } from './util/result'
export { ResultView } from './util/result'
