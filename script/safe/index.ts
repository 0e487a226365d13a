export * from './safe-types'
export * from './safe-errors'
export * from './safe-encoding'
export * from './safe-signer'
export * from './safe-schemas'
export * from './safe-api-http'
export * from './safe-pagination'
export * from './safe-query-filters'
export * from './proposal-log'
export * from './tx-services'
export * from './safe-service-client'
export type {
  ITxService,
  ITxServicesObject,
  SupportedNetwork,
} from '../common/types'
