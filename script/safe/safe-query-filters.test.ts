import { describe, expect, it } from 'vitest'

import { SafeClientError } from './safe-errors'
import {
  BalancesFilters,
  MultisigHistoryFilters,
  TokenListFilters,
} from './safe-query-filters'

describe('MultisigHistoryFilters', () => {
  it('serializes nonce bounds', () => {
    expect(
      new MultisigHistoryFilters().minNonce(3n).maxNonce(9n).toQuery()
    ).toEqual({ nonce__gte: '3', nonce__lte: '9' })
  })

  it('lets an exact nonce replace the bounds and the other way round', () => {
    const filters = new MultisigHistoryFilters().minNonce(3n).maxNonce(9n)

    filters.nonce(5n)
    expect(filters.list()).toEqual([{ kind: 'nonce', value: 5n }])
    expect(filters.toQuery()).toEqual({ nonce: '5' })

    filters.maxNonce(8n)
    expect(filters.has('nonce')).toBe(false)
    expect(filters.toQuery()).toEqual({ nonce__lte: '8' })
  })

  it('turns inclusive value bounds into the strict bounds of the API', () => {
    expect(
      new MultisigHistoryFilters().minValue(10n).maxValue(20n).toQuery()
    ).toEqual({ value__gt: '9', value__lt: '21' })
    expect(new MultisigHistoryFilters().minValue(0n).toQuery()).toEqual({})
  })

  it('lets an exact value replace the value bounds', () => {
    const filters = new MultisigHistoryFilters()
      .minValue(10n)
      .maxValue(20n)
      .value(15n)
    expect(filters.toQuery()).toEqual({ value: '15' })
  })

  it('serializes the remaining filters', () => {
    const safeTxHash = `0x${'ab'.repeat(32)}` as const
    const transactionHash = `0x${'cd'.repeat(32)}` as const

    expect(
      new MultisigHistoryFilters()
        .executed(false)
        .trusted(true)
        .to('0xf39fd6e51aad88f6f4ce6ab8827279cfffb92266')
        .safeTxHash(safeTxHash)
        .transactionHash(transactionHash)
        .ordering('-nonce')
        .limit(20)
        .offset(40)
        .toQuery()
    ).toEqual({
      executed: 'false',
      trusted: 'true',
      to: '0xf39Fd6e51aad88F6F4ce6aB8827279cffFb92266',
      safe_tx_hash: safeTxHash,
      transaction_hash: transactionHash,
      ordering: '-nonce',
      limit: '20',
      offset: '40',
    })
  })

  it('keeps the last value of a repeated filter', () => {
    expect(
      new MultisigHistoryFilters().limit(10).limit(50).toQuery()
    ).toEqual({ limit: '50' })
  })

  it('rejects negative and fractional quantities', () => {
    expect(() => new MultisigHistoryFilters().nonce(-1n)).toThrow(
      SafeClientError
    )
    expect(() => new MultisigHistoryFilters().limit(2.5)).toThrow(
      'Filter limit must be a non-negative integer, got 2.5'
    )
  })
})

describe('TokenListFilters', () => {
  it('serializes the token filters', () => {
    expect(
      new TokenListFilters()
        .name('Wrapped Ether')
        .symbol('WETH')
        .address('0xf39fd6e51aad88f6f4ce6ab8827279cfffb92266')
        .limit(5)
        .toQuery()
    ).toEqual({
      name: 'Wrapped Ether',
      symbol: 'WETH',
      address: '0xf39Fd6e51aad88F6F4ce6aB8827279cffFb92266',
      limit: '5',
    })
  })

  it('keeps exact and bounded decimals mutually exclusive', () => {
    const filters = new TokenListFilters().decimals(18)
    expect(filters.toQuery()).toEqual({ decimals: '18' })

    filters.minDecimals(6).maxDecimals(8)
    expect(filters.toQuery()).toEqual({
      decimals__gt: '5',
      decimals__lt: '9',
    })

    filters.decimals(0)
    expect(filters.toQuery()).toEqual({ decimals: '0' })
    expect(new TokenListFilters().minDecimals(0).toQuery()).toEqual({})
  })
})

describe('BalancesFilters', () => {
  it('serializes trusted and exclude_spam', () => {
    expect(
      new BalancesFilters().trusted(true).excludeSpam(false).toQuery()
    ).toEqual({ trusted: 'true', exclude_spam: 'false' })
    expect(new BalancesFilters().toQuery()).toEqual({})
  })
})
