export * from './contracts'
export * from './errors'
export * from './search'
export * from './service'
