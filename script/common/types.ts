import type txServices from '../../config/txServices.json'

export type SupportedNetwork = keyof typeof txServices

export interface ITxServicesObject {
  [key: string]: Omit<ITxService, 'id'>
}

export interface ITxService {
  name: string
  chainId: number
  // root of the service API, including its `/api/` segment
  url: string
  id: string
}
