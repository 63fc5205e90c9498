export { formatAddress, looksLikeAddress, parseAddress } from './address'
export * from './cli'
export * from './codec'
export * from './commands'
export { Connection } from './Connection'
export * from './constants'
export { DataSource } from './DataSource'
export type { DetailMode } from './DataSource'
export { DEFAULT_CONFIG } from './defaults'
export { Dispatcher } from './Dispatcher'
export type { IDispatchResult } from './Dispatcher'
export * from './errors'
export * from './format'
export { Item } from './Item'
export type { IItemFields, IItemStore } from './Item'
export * from './operations'
export * from './types'
