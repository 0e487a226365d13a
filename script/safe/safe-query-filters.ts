/**
 * Query filter builders for the list endpoints of the Safe Transaction
 * Service.
 *
 * Each supported filter is one variant of a closed union with a typed value.
 * Variants are turned into wire key/value pairs only by `toQuery()`. Setting
 * an exact filter clears the min/max variants of the same field and the
 * other way round.
 */

import { getAddress, type Address, type Hex } from 'viem'

import { SafeClientError, SafeClientErrorCode } from './safe-errors'

type WirePair = [key: string, value: string]

interface IFilterVariant {
  kind: string
}

const assertUint = (name: string, value: bigint | number): void => {
  const valid =
    typeof value === 'bigint'
      ? value >= 0n
      : Number.isSafeInteger(value) && value >= 0
  if (!valid)
    throw new SafeClientError(
      `Filter ${name} must be a non-negative integer, got ${value}`,
      SafeClientErrorCode.INVALID_INPUT,
      { filter: name }
    )
}

abstract class QueryFilters<F extends IFilterVariant> {
  private readonly filters = new Map<F['kind'], F>()

  protected set(filter: F, clears: F['kind'][] = []): this {
    for (const kind of clears) this.filters.delete(kind)
    this.filters.set(filter.kind, filter)
    return this
  }

  public has(kind: F['kind']): boolean {
    return this.filters.has(kind)
  }

  public list(): F[] {
    return [...this.filters.values()]
  }

  /**
   * Wire form of the current filters, in insertion order
   */
  public toQuery(): Record<string, string> {
    const query: Record<string, string> = {}
    for (const filter of this.filters.values()) {
      const pair = this.toWirePair(filter)
      if (pair) query[pair[0]] = pair[1]
    }
    return query
  }

  // null drops a filter that constrains nothing on the wire
  protected abstract toWirePair(filter: F): WirePair | null
}

// ============================================================================
// Multisig history
// ============================================================================

export type MultisigOrdering =
  | 'nonce'
  | '-nonce'
  | 'submissionDate'
  | '-submissionDate'
  | 'modified'
  | '-modified'
  | 'created'
  | '-created'

export type MultisigHistoryFilter =
  | { kind: 'nonce'; value: bigint }
  | { kind: 'minNonce'; value: bigint }
  | { kind: 'maxNonce'; value: bigint }
  | { kind: 'value'; value: bigint }
  | { kind: 'minValue'; value: bigint }
  | { kind: 'maxValue'; value: bigint }
  | { kind: 'executed'; value: boolean }
  | { kind: 'trusted'; value: boolean }
  | { kind: 'safeTxHash'; value: Hex }
  | { kind: 'to'; value: Address }
  | { kind: 'transactionHash'; value: Hex }
  | { kind: 'ordering'; value: MultisigOrdering }
  | { kind: 'limit'; value: number }
  | { kind: 'offset'; value: number }

export class MultisigHistoryFilters extends QueryFilters<MultisigHistoryFilter> {
  /** Filter txns with `nonce >= minNonce`. Clears any exact nonce filter */
  public minNonce(value: bigint): this {
    assertUint('minNonce', value)
    return this.set({ kind: 'minNonce', value }, ['nonce'])
  }

  /** Filter txns with `nonce <= maxNonce`. Clears any exact nonce filter */
  public maxNonce(value: bigint): this {
    assertUint('maxNonce', value)
    return this.set({ kind: 'maxNonce', value }, ['nonce'])
  }

  /** Filter by exact nonce. Clears any min or max nonce filter */
  public nonce(value: bigint): this {
    assertUint('nonce', value)
    return this.set({ kind: 'nonce', value }, ['minNonce', 'maxNonce'])
  }

  /** Filter txns with `value >= minValue`. Clears any exact value filter */
  public minValue(value: bigint): this {
    assertUint('minValue', value)
    return this.set({ kind: 'minValue', value }, ['value'])
  }

  /** Filter txns with `value <= maxValue`. Clears any exact value filter */
  public maxValue(value: bigint): this {
    assertUint('maxValue', value)
    return this.set({ kind: 'maxValue', value }, ['value'])
  }

  /** Filter by exact value. Clears any min or max value filter */
  public value(value: bigint): this {
    assertUint('value', value)
    return this.set({ kind: 'value', value }, ['minValue', 'maxValue'])
  }

  public executed(value: boolean): this {
    return this.set({ kind: 'executed', value })
  }

  public trusted(value: boolean): this {
    return this.set({ kind: 'trusted', value })
  }

  public safeTxHash(value: Hex): this {
    return this.set({ kind: 'safeTxHash', value })
  }

  public to(value: Address): this {
    return this.set({ kind: 'to', value: getAddress(value) })
  }

  /** Filter by the hash of the executing on-chain transaction */
  public transactionHash(value: Hex): this {
    return this.set({ kind: 'transactionHash', value })
  }

  public ordering(value: MultisigOrdering): this {
    return this.set({ kind: 'ordering', value })
  }

  /**
   * Page size. The service paginates whenever more results than `limit` exist
   */
  public limit(value: number): this {
    assertUint('limit', value)
    return this.set({ kind: 'limit', value })
  }

  // set by the service in `next` links; rarely useful by hand
  public offset(value: number): this {
    assertUint('offset', value)
    return this.set({ kind: 'offset', value })
  }

  protected toWirePair(filter: MultisigHistoryFilter): WirePair | null {
    switch (filter.kind) {
      case 'nonce':
        return ['nonce', filter.value.toString()]
      case 'minNonce':
        return ['nonce__gte', filter.value.toString()]
      case 'maxNonce':
        return ['nonce__lte', filter.value.toString()]
      case 'value':
        return ['value', filter.value.toString()]
      // the service only takes strict bounds for value
      case 'minValue':
        return filter.value === 0n
          ? null
          : ['value__gt', (filter.value - 1n).toString()]
      case 'maxValue':
        return ['value__lt', (filter.value + 1n).toString()]
      case 'executed':
        return ['executed', String(filter.value)]
      case 'trusted':
        return ['trusted', String(filter.value)]
      case 'safeTxHash':
        return ['safe_tx_hash', filter.value]
      case 'to':
        return ['to', filter.value]
      case 'transactionHash':
        return ['transaction_hash', filter.value]
      case 'ordering':
        return ['ordering', filter.value]
      case 'limit':
        return ['limit', filter.value.toString()]
      case 'offset':
        return ['offset', filter.value.toString()]
    }
  }
}

// ============================================================================
// Token list
// ============================================================================

export type TokenListFilter =
  | { kind: 'name'; value: string }
  | { kind: 'address'; value: Address }
  | { kind: 'symbol'; value: string }
  | { kind: 'decimals'; value: number }
  | { kind: 'minDecimals'; value: number }
  | { kind: 'maxDecimals'; value: number }
  | { kind: 'limit'; value: number }
  | { kind: 'offset'; value: number }

export class TokenListFilters extends QueryFilters<TokenListFilter> {
  public name(value: string): this {
    return this.set({ kind: 'name', value })
  }

  public address(value: Address): this {
    return this.set({ kind: 'address', value: getAddress(value) })
  }

  public symbol(value: string): this {
    return this.set({ kind: 'symbol', value })
  }

  /** Tokens with `decimals >= minDecimals`. Clears any exact decimals filter */
  public minDecimals(value: number): this {
    assertUint('minDecimals', value)
    return this.set({ kind: 'minDecimals', value }, ['decimals'])
  }

  /** Tokens with `decimals <= maxDecimals`. Clears any exact decimals filter */
  public maxDecimals(value: number): this {
    assertUint('maxDecimals', value)
    return this.set({ kind: 'maxDecimals', value }, ['decimals'])
  }

  /** Exact decimals. Clears any min or max decimals filter */
  public decimals(value: number): this {
    assertUint('decimals', value)
    return this.set({ kind: 'decimals', value }, [
      'minDecimals',
      'maxDecimals',
    ])
  }

  public limit(value: number): this {
    assertUint('limit', value)
    return this.set({ kind: 'limit', value })
  }

  public offset(value: number): this {
    assertUint('offset', value)
    return this.set({ kind: 'offset', value })
  }

  protected toWirePair(filter: TokenListFilter): WirePair | null {
    switch (filter.kind) {
      case 'name':
        return ['name', filter.value]
      case 'address':
        return ['address', filter.value]
      case 'symbol':
        return ['symbol', filter.value]
      case 'decimals':
        return ['decimals', filter.value.toString()]
      case 'minDecimals':
        return filter.value === 0
          ? null
          : ['decimals__gt', (filter.value - 1).toString()]
      case 'maxDecimals':
        return ['decimals__lt', (filter.value + 1).toString()]
      case 'limit':
        return ['limit', filter.value.toString()]
      case 'offset':
        return ['offset', filter.value.toString()]
    }
  }
}

// ============================================================================
// Balances
// ============================================================================

export type BalancesFilter =
  | { kind: 'trusted'; value: boolean }
  | { kind: 'excludeSpam'; value: boolean }

export class BalancesFilters extends QueryFilters<BalancesFilter> {
  /** Only return tokens the service marks as trusted */
  public trusted(value: boolean): this {
    return this.set({ kind: 'trusted', value })
  }

  public excludeSpam(value: boolean): this {
    return this.set({ kind: 'excludeSpam', value })
  }

  protected toWirePair(filter: BalancesFilter): WirePair {
    switch (filter.kind) {
      case 'trusted':
        return ['trusted', String(filter.value)]
      case 'excludeSpam':
        return ['exclude_spam', String(filter.value)]
    }
  }
}
