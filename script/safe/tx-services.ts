/**
 * Registry of hosted Safe Transaction Service deployments, loaded from
 * config/txServices.json and keyed by network name.
 */

import txServicesConfig from '../../config/txServices.json'
import type { ITxService, ITxServicesObject } from '../common/types'

import { SafeClientError, SafeClientErrorCode } from './safe-errors'

const txServices: ITxServicesObject = txServicesConfig

const withTrailingSlash = (url: string): string =>
  url.endsWith('/') ? url : `${url}/`

/**
 * Looks up the service for a network name such as `mainnet` or `gnosis`
 */
export const getTxServiceByNetwork = (network: string): ITxService => {
  const service = Object.hasOwn(txServices, network)
    ? txServices[network]
    : undefined
  if (!service)
    throw new SafeClientError(
      `No Safe Transaction Service known for network ${network}`,
      SafeClientErrorCode.UNKNOWN_SERVICE,
      { network }
    )

  return { ...service, id: network }
}

/**
 * Looks up the service for an EIP-155 chain id
 */
export const getTxServiceByChainId = (chainId: number): ITxService => {
  const entry = Object.entries(txServices).find(
    ([, service]) => service.chainId === chainId
  )
  if (!entry)
    throw new SafeClientError(
      `No Safe Transaction Service known for chain id ${chainId}`,
      SafeClientErrorCode.UNKNOWN_SERVICE,
      { chainId }
    )

  const [id, service] = entry
  return { ...service, id }
}

/**
 * Describes a self-hosted service. `url` is the API root, e.g.
 * `https://safe.example.org/api/`.
 */
export const createCustomTxService = (
  chainId: number,
  url: string,
  name = `Custom (${chainId})`
): ITxService => {
  let parsed: URL
  try {
    parsed = new URL(url)
  } catch (error) {
    throw new SafeClientError(
      `Invalid service URL: ${url}`,
      SafeClientErrorCode.INVALID_INPUT,
      { url },
      { cause: error }
    )
  }

  return {
    name,
    chainId,
    url: withTrailingSlash(parsed.toString()),
    id: 'custom',
  }
}
