/**
 * In-process stand-in for the Safe Transaction Service used by the tests.
 * Routes are keyed by `${method} ${url}`; unknown routes answer 404.
 */

import type { Address, Hex } from 'viem'

import type { ITxService } from '../../common/types'
import type { FetchLike } from '../safe-api-http'
import { ZERO_ADDRESS } from '../safe-types'

export const SAFE_ADDRESS: Address = '0x1111111111111111111111111111111111111111'
export const TO_ADDRESS: Address = '0x2222222222222222222222222222222222222222'
export const OWNER_ADDRESS: Address =
  '0x3333333333333333333333333333333333333333'

// placeholder keys, not funded anywhere
export const SIGNER_KEY: Hex = `0x${'11'.repeat(32)}`
export const OTHER_SIGNER_KEY: Hex = `0x${'22'.repeat(32)}`

export const TEST_SERVICE: ITxService = {
  name: 'Test',
  chainId: 5,
  url: 'https://safe.test/api/',
  id: 'test',
}

export const historyUrl = (safe: Address = SAFE_ADDRESS) =>
  `https://safe.test/api/v1/safes/${safe}/multisig-transactions/`

export const transactionUrl = (safeTxHash: Hex) =>
  `https://safe.test/api/v1/multisig-transactions/${safeTxHash}/`

export const json = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  })

export const created = () => new Response('', { status: 201 })

export interface IRecordedRequest {
  method: string
  url: string
  body: unknown
}

export type Route = () => Response | Promise<Response>

export const createFakeService = (routes: Record<string, Route> = {}) => {
  const requests: IRecordedRequest[] = []

  const fetch: FetchLike = async (input, init) => {
    const method = init?.method ?? 'GET'
    const url = input.toString()
    const body: unknown =
      typeof init?.body === 'string' ? JSON.parse(init.body) : undefined
    requests.push({ method, url, body })

    const route = routes[`${method} ${url}`]
    return route ? route() : new Response('Not found', { status: 404 })
  }

  return { fetch, requests, routes }
}

export const wireSafeInfo = (nonce: number, owners: Address[]) => ({
  address: SAFE_ADDRESS,
  nonce: nonce.toString(),
  threshold: 2,
  owners,
  masterCopy: '0xd9db270c1b5e3bd161e8c8503c55ceabee709552',
  modules: [],
  fallbackHandler: '0xf48f2b2d2a534e402487b3ee7c18c33aec0fe5e4',
  guard: ZERO_ADDRESS,
  version: '1.3.0',
})

/**
 * A multisig transaction record the way the service serializes it
 */
export const wireRecord = (
  nonce: number,
  overrides: Record<string, unknown> = {}
) => ({
  safe: SAFE_ADDRESS,
  to: TO_ADDRESS,
  value: '0',
  data: null,
  operation: 0,
  gasToken: ZERO_ADDRESS,
  safeTxGas: '0',
  baseGas: '0',
  gasPrice: '0',
  refundReceiver: ZERO_ADDRESS,
  nonce: nonce.toString(),
  executionDate: null,
  submissionDate: '2024-05-01T10:00:00Z',
  modified: '2024-05-01T10:00:00Z',
  blockNumber: null,
  transactionHash: null,
  safeTxHash: `0x${nonce.toString(16).padStart(64, '0')}`,
  executor: null,
  isExecuted: false,
  isSuccessful: null,
  ethGasPrice: null,
  maxFeePerGas: null,
  maxPriorityFeePerGas: null,
  gasUsed: null,
  fee: null,
  origin: null,
  dataDecoded: null,
  confirmationsRequired: 2,
  confirmations: [],
  trusted: true,
  signatures: null,
  ...overrides,
})

export const wirePage = <T>(results: T[], next: string | null, count = 0) => ({
  count: count || results.length,
  next,
  previous: null,
  results,
})
