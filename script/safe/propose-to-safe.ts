#!/usr/bin/env tsx

/**
 * Propose to Safe
 *
 * Signs a transaction for a Safe and proposes it to the Safe Transaction
 * Service. The nonce is the next free one in the Safe's multisig history
 * unless --nonce is given.
 */

import 'dotenv/config'
import { defineCommand, runMain } from 'citty'
import { consola } from 'consola'
import { isAddressEqual } from 'viem'
import { privateKeyToAccount } from 'viem/accounts'

import {
  bigintReplacer,
  getPrivateKey,
  parseAddressArg,
  parseHexArg,
  parseUintArg,
  resolveServiceClient,
} from './safe-cli-utils'
import { buildSafeTransaction } from './safe-encoding'
import { getErrorMessage } from './safe-errors'
import { getProposalStatus } from './safe-service-client'
import { OperationTypeEnum } from './safe-types'

const main = defineCommand({
  meta: {
    name: 'propose-to-safe',
    description: 'Propose a transaction to a Safe via the Safe Transaction Service',
  },
  args: {
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
    safeAddress: {
      type: 'string',
      description: 'Address of the Safe',
      required: true,
    },
    privateKey: {
      type: 'string',
      description: 'Private key of the signer, defaults to SAFE_SIGNER_PRIVATE_KEY',
    },
    to: {
      type: 'string',
      description: 'To address',
      required: true,
    },
    calldata: {
      type: 'string',
      description: 'Calldata',
      default: '0x',
    },
    value: {
      type: 'string',
      description: 'Value in wei',
      default: '0',
    },
    delegateCall: {
      type: 'boolean',
      description: 'Propose a DelegateCall instead of a Call',
      default: false,
    },
    nonce: {
      type: 'string',
      description: 'Use this nonce instead of the next free one',
    },
    origin: {
      type: 'string',
      description: 'Free-form origin note stored with the proposal',
    },
  },
  async run({ args }) {
    const safeAddress = parseAddressArg(args.safeAddress, 'safeAddress')
    const account = privateKeyToAccount(getPrivateKey(args.privateKey))
    const client = resolveServiceClient(args).withSigner(account)

    consola.info('Signer Address', account.address)
    consola.info('Safe Address', safeAddress)
    consola.info('Service', `${client.service.name} (${client.service.url})`)

    const { owners } = await client.getSafeInfo(safeAddress)
    if (!owners.some((owner) => isAddressEqual(owner, account.address))) {
      consola.error('The current signer is not an owner of this Safe')
      consola.error('Current owners:', owners)
      process.exit(1)
    }

    const meta = {
      to: parseAddressArg(args.to, 'to'),
      value: parseUintArg(args.value, 'value'),
      data: parseHexArg(args.calldata, 'calldata'),
      operation: args.delegateCall
        ? OperationTypeEnum.DelegateCall
        : OperationTypeEnum.Call,
    }
    const options = {
      origin: args.origin,
      onStateChange: (state: string) => consola.debug(`Proposal ${state}`),
    }

    try {
      const record =
        args.nonce === undefined
          ? await client.propose(meta, safeAddress, options)
          : await client.proposeTransaction(
              buildSafeTransaction(meta, parseUintArg(args.nonce, 'nonce')),
              safeAddress,
              options
            )

      consola.success(`Proposed ${record.safeTxHash} at nonce ${record.nonce}`)
      consola.info('Status', getProposalStatus(record))
      consola.log(JSON.stringify(record, bigintReplacer, 2))
    } catch (error) {
      consola.error('Failed to propose transaction:', getErrorMessage(error))
      process.exit(1)
    }
  },
})

runMain(main)
