export * from './date'
export * from './locale'
export * from './errors'
export * from './cellStyle'
export * from './textVariable'
export * from './virtualEvents'
