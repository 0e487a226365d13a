import { isHex, type Address, type Hex } from 'viem'
import { z } from 'zod'

import { SafeClientError, SafeClientErrorCode } from './safe-errors'
import { addressSchema, uintSchema } from './safe-schemas'
import {
  SafeServiceClient,
  type ISafeServiceClientOptions,
} from './safe-service-client'

export interface IServiceArgs {
  network?: string
  chainId?: string
  serviceUrl?: string
}

const privateKeySchema = z
  .string()
  .transform((v) => (v.startsWith('0x') ? v : `0x${v}`))
  .refine(
    (v): v is Hex => isHex(v, { strict: true }) && v.length === 66,
    'Private key must be 32 bytes of hex'
  )

const chainIdSchema = z.coerce.number().int().positive()

const invalidInput = (what: string, value: unknown, error: z.ZodError) =>
  new SafeClientError(
    `Invalid ${what} "${String(value)}": ${error.issues
      .map((issue) => issue.message)
      .join(', ')}`,
    SafeClientErrorCode.INVALID_INPUT,
    { [what]: value }
  )

/**
 * Reads the signer key from the argument or SAFE_SIGNER_PRIVATE_KEY
 * @param privateKeyArg - Key given on the command line, with or without 0x
 */
export function getPrivateKey(privateKeyArg?: string): Hex {
  const privateKey = privateKeyArg || process.env.SAFE_SIGNER_PRIVATE_KEY

  if (!privateKey)
    throw new SafeClientError(
      'Private key is missing, either provide it as argument or add SAFE_SIGNER_PRIVATE_KEY to your .env',
      SafeClientErrorCode.INVALID_INPUT
    )

  const parsed = privateKeySchema.safeParse(privateKey)
  if (!parsed.success)
    throw new SafeClientError(
      'Private key must be 32 bytes of hex',
      SafeClientErrorCode.INVALID_INPUT
    )
  return parsed.data
}

export const parseAddressArg = (value: string, what = 'address'): Address => {
  const parsed = addressSchema.safeParse(value)
  if (!parsed.success) throw invalidInput(what, value, parsed.error)
  return parsed.data
}

export const parseUintArg = (value: string, what = 'value'): bigint => {
  const parsed = uintSchema.safeParse(value)
  if (!parsed.success) throw invalidInput(what, value, parsed.error)
  return parsed.data
}

export const parseHexArg = (value: string, what = 'data'): Hex => {
  if (!isHex(value, { strict: true }))
    throw new SafeClientError(
      `Invalid ${what} "${value}": expected 0x-prefixed hex`,
      SafeClientErrorCode.INVALID_INPUT,
      { [what]: value }
    )
  return value
}

/**
 * Picks the service from --serviceUrl (or SAFE_TX_SERVICE_URL) with
 * --chainId, else from --network, else from --chainId alone
 */
export const resolveServiceClient = (
  args: IServiceArgs,
  options: ISafeServiceClientOptions = {}
): SafeServiceClient => {
  let chainId: number | undefined
  if (args.chainId !== undefined) {
    const parsed = chainIdSchema.safeParse(args.chainId)
    if (!parsed.success) throw invalidInput('chainId', args.chainId, parsed.error)
    chainId = parsed.data
  }

  const serviceUrl = args.serviceUrl || process.env.SAFE_TX_SERVICE_URL
  if (serviceUrl && chainId !== undefined)
    return SafeServiceClient.fromUrl(chainId, serviceUrl, options)
  if (args.network) return SafeServiceClient.fromNetwork(args.network, options)
  if (chainId !== undefined)
    return SafeServiceClient.fromChainId(chainId, options)

  throw new SafeClientError(
    'Either --network or --chainId must be provided',
    SafeClientErrorCode.INVALID_INPUT
  )
}

/**
 * JSON.stringify replacer printing bigint fields as decimal strings
 */
export const bigintReplacer = (_key: string, value: unknown): unknown =>
  typeof value === 'bigint' ? value.toString() : value
