import { afterEach, describe, expect, it, vi } from 'vitest'

import {
  bigintReplacer,
  getPrivateKey,
  parseAddressArg,
  parseHexArg,
  parseUintArg,
  resolveServiceClient,
} from './safe-cli-utils'

const KEY = '11'.repeat(32)

afterEach(() => {
  vi.unstubAllEnvs()
})

describe('getPrivateKey', () => {
  it('prefers the argument and adds the 0x prefix', () => {
    vi.stubEnv('SAFE_SIGNER_PRIVATE_KEY', `0x${'22'.repeat(32)}`)
    expect(getPrivateKey(KEY)).toBe(`0x${KEY}`)
  })

  it('falls back to SAFE_SIGNER_PRIVATE_KEY', () => {
    vi.stubEnv('SAFE_SIGNER_PRIVATE_KEY', `0x${'22'.repeat(32)}`)
    expect(getPrivateKey()).toBe(`0x${'22'.repeat(32)}`)
  })

  it('rejects a missing or malformed key', () => {
    vi.stubEnv('SAFE_SIGNER_PRIVATE_KEY', '')
    expect(() => getPrivateKey()).toThrow('Private key is missing')
    expect(() => getPrivateKey('0x1234')).toThrow(
      'Private key must be 32 bytes of hex'
    )
  })
})

describe('argument parsing', () => {
  it('checksums addresses and reads quantities', () => {
    expect(parseAddressArg('0xf39fd6e51aad88f6f4ce6ab8827279cfffb92266')).toBe(
      '0xf39Fd6e51aad88F6F4ce6aB8827279cffFb92266'
    )
    expect(parseUintArg('1000000000000000000')).toBe(10n ** 18n)
    expect(parseHexArg('0xabcdef')).toBe('0xabcdef')
  })

  it('names the offending argument', () => {
    expect(() => parseUintArg('-5', 'nonce')).toThrow('Invalid nonce "-5"')
    expect(() => parseHexArg('abc', 'calldata')).toThrow(
      'Invalid calldata "abc": expected 0x-prefixed hex'
    )
  })
})

describe('resolveServiceClient', () => {
  it('resolves by network name or chain id', () => {
    vi.stubEnv('SAFE_TX_SERVICE_URL', '')
    expect(resolveServiceClient({ network: 'base' }).chainId).toBe(8453)
    expect(resolveServiceClient({ chainId: '10' }).service.id).toBe('optimism')
  })

  it('uses a custom service URL with a chain id', () => {
    vi.stubEnv('SAFE_TX_SERVICE_URL', 'https://safe.example.org/api')
    const client = resolveServiceClient({ chainId: '5', network: 'mainnet' })
    expect(client.service.url).toBe('https://safe.example.org/api/')
    expect(client.chainId).toBe(5)
  })

  it('needs a network or chain id', () => {
    vi.stubEnv('SAFE_TX_SERVICE_URL', '')
    expect(() => resolveServiceClient({})).toThrow(
      'Either --network or --chainId must be provided'
    )
    expect(() => resolveServiceClient({ chainId: 'abc' })).toThrow(
      'Invalid chainId "abc"'
    )
  })
})

describe('bigintReplacer', () => {
  it('prints bigint values as decimal strings', () => {
    expect(JSON.stringify({ nonce: 4n, to: 'x' }, bigintReplacer)).toBe(
      '{"nonce":"4","to":"x"}'
    )
  })
})
