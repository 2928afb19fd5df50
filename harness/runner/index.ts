export * from './evaluate'
export * from './PropertyRunner'
export * from './report'
export * from './config'
