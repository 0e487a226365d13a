import { describe, expect, it } from 'vitest'

import { SafeClientErrorCode } from './safe-errors'
import {
  createCustomTxService,
  getTxServiceByChainId,
  getTxServiceByNetwork,
} from './tx-services'

describe('tx-services', () => {
  it('finds a service by chain id', () => {
    expect(getTxServiceByChainId(100)).toEqual({
      name: 'Gnosis Chain',
      chainId: 100,
      url: 'https://safe-transaction-gnosis-chain.safe.global/api/',
      id: 'gnosis',
    })
  })

  it('finds a service by network name', () => {
    const service = getTxServiceByNetwork('mainnet')
    expect(service.chainId).toBe(1)
    expect(service.url).toBe('https://safe-transaction-mainnet.safe.global/api/')
  })

  it('rejects unknown chains and networks', () => {
    expect(() => getTxServiceByChainId(999_999)).toThrow(
      'No Safe Transaction Service known for chain id 999999'
    )
    try {
      getTxServiceByNetwork('nowhere')
      expect.unreachable()
    } catch (error) {
      expect(error).toMatchObject({
        code: SafeClientErrorCode.UNKNOWN_SERVICE,
        details: { network: 'nowhere' },
      })
    }
  })

  it('does not treat inherited object keys as networks', () => {
    for (const network of ['constructor', 'toString', '__proto__'])
      expect(() => getTxServiceByNetwork(network)).toThrow(
        `No Safe Transaction Service known for network ${network}`
      )

    const error = (() => {
      try {
        return getTxServiceByNetwork('constructor')
      } catch (e) {
        return e
      }
    })()
    expect(error).toMatchObject({ code: SafeClientErrorCode.UNKNOWN_SERVICE })
  })

  it('describes a self-hosted service with a normalized root', () => {
    expect(createCustomTxService(5, 'https://safe.example.org/api')).toEqual({
      name: 'Custom (5)',
      chainId: 5,
      url: 'https://safe.example.org/api/',
      id: 'custom',
    })
    expect(() => createCustomTxService(5, 'not a url')).toThrow(
      'Invalid service URL: not a url'
    )
  })
})
