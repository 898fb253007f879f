export { DateEntry } from './DateEntry'
export type { DateEntryHandle, DateEntryProps } from './DateEntry'
