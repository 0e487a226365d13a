#!/usr/bin/env tsx

/**
 * Query Safe Service
 *
 * Read-only queries against the Safe Transaction Service. Results are
 * printed as JSON with uint256 values as decimal strings.
 */

import 'dotenv/config'
import { defineCommand, runMain } from 'citty'
import { consola } from 'consola'

import {
  bigintReplacer,
  parseAddressArg,
  parseHexArg,
  parseUintArg,
  resolveServiceClient,
} from './safe-cli-utils'
import { getErrorMessage } from './safe-errors'
import { collect } from './safe-pagination'
import {
  BalancesFilters,
  MultisigHistoryFilters,
  TokenListFilters,
} from './safe-query-filters'
import { getProposalStatus } from './safe-service-client'
import { OperationTypeEnum } from './safe-types'

const serviceArgs = {
  network: {
    type: 'string',
    description: 'Network name as listed in config/txServices.json',
  },
  chainId: {
    type: 'string',
    description: 'Chain id (with --serviceUrl for a self-hosted service)',
  },
  serviceUrl: {
    type: 'string',
    description: 'Service API root, defaults to SAFE_TX_SERVICE_URL',
  },
} as const

const safeArgs = {
  ...serviceArgs,
  safeAddress: {
    type: 'string',
    description: 'Address of the Safe',
    required: true,
  },
} as const

const print = (value: unknown) =>
  consola.log(JSON.stringify(value, bigintReplacer, 2))

const runQuery = async (label: string, query: () => Promise<unknown>) => {
  try {
    print(await query())
  } catch (error) {
    consola.error(`Failed to ${label}:`, getErrorMessage(error))
    process.exit(1)
  }
}

const infoCommand = defineCommand({
  meta: { name: 'info', description: 'Show owners, threshold and nonce' },
  args: safeArgs,
  async run({ args }) {
    await runQuery('fetch Safe info', () =>
      resolveServiceClient(args).getSafeInfo(
        parseAddressArg(args.safeAddress, 'safeAddress')
      )
    )
  },
})

const historyCommand = defineCommand({
  meta: {
    name: 'history',
    description: 'List multisig transactions across all pages',
  },
  args: {
    ...safeArgs,
    minNonce: { type: 'string', description: 'Lowest nonce to include' },
    maxNonce: { type: 'string', description: 'Highest nonce to include' },
    nonce: { type: 'string', description: 'Exact nonce' },
    executed: {
      type: 'string',
      description: 'Only executed (true) or pending (false) transactions',
    },
    limit: { type: 'string', description: 'Page size' },
  },
  async run({ args }) {
    const filters = new MultisigHistoryFilters().ordering('nonce')
    if (args.minNonce) filters.minNonce(parseUintArg(args.minNonce, 'minNonce'))
    if (args.maxNonce) filters.maxNonce(parseUintArg(args.maxNonce, 'maxNonce'))
    if (args.nonce) filters.nonce(parseUintArg(args.nonce, 'nonce'))
    if (args.executed) filters.executed(args.executed === 'true')
    if (args.limit) filters.limit(Number(parseUintArg(args.limit, 'limit')))

    await runQuery('fetch history', async () => {
      const records = await collect(
        resolveServiceClient(args).streamMultisigHistory(
          parseAddressArg(args.safeAddress, 'safeAddress'),
          filters
        )
      )
      return records.map((record) => ({
        nonce: record.nonce,
        safeTxHash: record.safeTxHash,
        to: record.to,
        status: getProposalStatus(record),
        confirmations: `${record.confirmations.length}/${
          record.confirmationsRequired ?? '?'
        }`,
      }))
    })
  },
})

const txCommand = defineCommand({
  meta: { name: 'tx', description: 'Show one multisig transaction' },
  args: {
    ...serviceArgs,
    safeTxHash: {
      type: 'string',
      description: 'safeTxHash of the transaction',
      required: true,
    },
  },
  async run({ args }) {
    await runQuery('fetch transaction', async () => {
      const record = await resolveServiceClient(args).getTransaction(
        parseHexArg(args.safeTxHash, 'safeTxHash')
      )
      return { ...record, status: getProposalStatus(record) }
    })
  },
})

const nextNonceCommand = defineCommand({
  meta: {
    name: 'next-nonce',
    description: 'Next free nonce after the Safe multisig history',
  },
  args: safeArgs,
  async run({ args }) {
    await runQuery('compute next nonce', () =>
      resolveServiceClient(args).getNextNonce(
        parseAddressArg(args.safeAddress, 'safeAddress')
      )
    )
  },
})

const estimateCommand = defineCommand({
  meta: { name: 'estimate', description: 'Estimate safeTxGas for a call' },
  args: {
    ...safeArgs,
    to: { type: 'string', description: 'To address', required: true },
    calldata: { type: 'string', description: 'Calldata', default: '0x' },
    value: { type: 'string', description: 'Value in wei', default: '0' },
    delegateCall: {
      type: 'boolean',
      description: 'Estimate a DelegateCall',
      default: false,
    },
  },
  async run({ args }) {
    await runQuery('estimate safeTxGas', async () => ({
      safeTxGas: await resolveServiceClient(args).estimateSafeTxGas(
        parseAddressArg(args.safeAddress, 'safeAddress'),
        {
          to: parseAddressArg(args.to, 'to'),
          value: parseUintArg(args.value, 'value'),
          data: parseHexArg(args.calldata, 'calldata'),
          operation: args.delegateCall
            ? OperationTypeEnum.DelegateCall
            : OperationTypeEnum.Call,
        }
      ),
    }))
  },
})

const tokensCommand = defineCommand({
  meta: { name: 'tokens', description: 'Search the token list' },
  args: {
    ...serviceArgs,
    symbol: { type: 'string', description: 'Token symbol' },
    name: { type: 'string', description: 'Token name' },
    address: { type: 'string', description: 'Token address' },
    decimals: { type: 'string', description: 'Exact decimals' },
    limit: { type: 'string', description: 'Page size', default: '20' },
  },
  async run({ args }) {
    const filters = new TokenListFilters().limit(
      Number(parseUintArg(args.limit, 'limit'))
    )
    if (args.symbol) filters.symbol(args.symbol)
    if (args.name) filters.name(args.name)
    if (args.address) filters.address(parseAddressArg(args.address))
    if (args.decimals)
      filters.decimals(Number(parseUintArg(args.decimals, 'decimals')))

    // first page only; the full list is large
    await runQuery('fetch tokens', () =>
      resolveServiceClient(args).getTokens(filters)
    )
  },
})

const balancesCommand = defineCommand({
  meta: { name: 'balances', description: 'Show the Safe token balances' },
  args: {
    ...safeArgs,
    trusted: {
      type: 'boolean',
      description: 'Only trusted tokens',
      default: false,
    },
    excludeSpam: {
      type: 'boolean',
      description: 'Leave out tokens flagged as spam',
      default: true,
    },
  },
  async run({ args }) {
    await runQuery('fetch balances', () =>
      resolveServiceClient(args).getBalances(
        parseAddressArg(args.safeAddress, 'safeAddress'),
        new BalancesFilters()
          .trusted(args.trusted)
          .excludeSpam(args.excludeSpam)
      )
    )
  },
})

const main = defineCommand({
  meta: {
    name: 'query-safe-service',
    description: 'Query the Safe Transaction Service',
    version: '1.0.0',
  },
  subCommands: {
    info: infoCommand,
    history: historyCommand,
    tx: txCommand,
    'next-nonce': nextNonceCommand,
    estimate: estimateCommand,
    tokens: tokensCommand,
    balances: balancesCommand,
  },
})

runMain(main)
