export * from './errors'
export * from './interface'
export * from './abi'
export * from './arbitraries'
export { AccountState } from './state/AccountState'
export { TokenCaller, isMutating } from './adapter/TokenCaller'
export * from './subjects'
export * from './properties'
export * as scenarios from './properties/scenarios'
export * from './properties/checks'
export * from './runner'
