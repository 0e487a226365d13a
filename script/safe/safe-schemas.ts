/**
 * Wire codecs for the Safe Transaction Service.
 *
 * Responses are decoded with zod into the bigint/checksummed shapes of
 * safe-types.ts. Requests are encoded with addresses checksummed and every
 * uint256 quantity as decimal text.
 */

import { getAddress, isAddress, isHex, type Address, type Hex } from 'viem'
import { z } from 'zod'

import {
  OperationTypeEnum,
  ZERO_ADDRESS,
  type IBalanceResponse,
  type IEstimateRequest,
  type IMultisigTransactionResponse,
  type IPaginatedResponse,
  type IProposeRequest,
  type ISafeInfoResponse,
  type ITokenInfoResponse,
} from './safe-types'

export type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>

const nullable = <T extends z.ZodTypeAny>(schema: T) =>
  schema.nullish().transform((v): z.output<T> | null => v ?? null)

export const addressSchema = z
  .string()
  .refine((v) => isAddress(v, { strict: false }), 'Invalid address')
  .transform((v): Address => getAddress(v))

export const hexSchema = z
  .string()
  .refine((v): v is Hex => isHex(v, { strict: true }), 'Invalid hex string')

// the service sends uint256 values as decimal strings, small ones as numbers
export const uintSchema = z
  .union([z.string().regex(/^\d+$/), z.number().int().nonnegative()])
  .transform((v) => BigInt(v))

export const operationSchema = z.nativeEnum(OperationTypeEnum)

export const errorResponseSchema = z.object({
  code: z.number().int(),
  message: nullable(z.string()),
  arguments: z.array(z.unknown()).default([]),
})
export type ErrorResponse = z.output<typeof errorResponseSchema>

export const safeInfoSchema: Schema<ISafeInfoResponse> = z.object({
  address: addressSchema,
  nonce: uintSchema,
  threshold: z.number().int().nonnegative(),
  owners: z.array(addressSchema),
  masterCopy: addressSchema,
  modules: z.array(addressSchema),
  fallbackHandler: addressSchema,
  guard: addressSchema,
  version: z
    .string()
    .nullish()
    .transform((v) => v ?? undefined),
})

const confirmationSchema = z.object({
  owner: addressSchema,
  submissionDate: z.string(),
  transactionHash: nullable(hexSchema),
  signature: hexSchema,
  signatureType: z.string(),
})

const decodedDataSchema = z.object({
  method: z.string(),
  parameters: z
    .array(z.object({ name: z.string(), type: z.string() }))
    .nullish()
    .transform((v) => v ?? []),
})

export const multisigTransactionSchema: Schema<IMultisigTransactionResponse> =
  z.object({
    safe: addressSchema,
    to: addressSchema,
    value: uintSchema.default('0'),
    data: nullable(hexSchema),
    operation: operationSchema,
    gasToken: nullable(addressSchema).transform((v) => v ?? ZERO_ADDRESS),
    safeTxGas: uintSchema,
    baseGas: uintSchema,
    gasPrice: uintSchema,
    refundReceiver: nullable(addressSchema).transform(
      (v) => v ?? ZERO_ADDRESS
    ),
    nonce: uintSchema,
    executionDate: nullable(z.string()),
    submissionDate: z.string(),
    modified: z.string(),
    blockNumber: nullable(z.number().int()),
    transactionHash: nullable(hexSchema),
    safeTxHash: hexSchema,
    executor: nullable(addressSchema),
    isExecuted: z.boolean(),
    isSuccessful: nullable(z.boolean()),
    ethGasPrice: nullable(uintSchema),
    maxFeePerGas: nullable(uintSchema),
    maxPriorityFeePerGas: nullable(uintSchema),
    gasUsed: nullable(z.number().int()),
    fee: nullable(uintSchema),
    origin: nullable(z.string()),
    dataDecoded: nullable(decodedDataSchema),
    confirmationsRequired: nullable(z.number().int()),
    confirmations: z.array(confirmationSchema).default([]),
    trusted: z.boolean().default(false),
    signatures: nullable(hexSchema),
  })

export const tokenInfoSchema: Schema<ITokenInfoResponse> = z.object({
  type: z.enum(['ERC20', 'ERC721', 'ERC1155', 'NATIVE_TOKEN']),
  address: addressSchema,
  name: z.string(),
  symbol: z.string(),
  decimals: nullable(z.number().int()),
  logoUri: nullable(z.string()),
})

export const balanceSchema: Schema<IBalanceResponse> = z.object({
  tokenAddress: nullable(addressSchema),
  token: nullable(
    z.object({
      name: z.string(),
      symbol: z.string(),
      decimals: nullable(z.number().int()),
      logoUri: nullable(z.string()),
    })
  ),
  balance: uintSchema,
})

export const balancesSchema: Schema<IBalanceResponse[]> = z.array(balanceSchema)

export const estimateResponseSchema: Schema<{ safeTxGas: bigint }> = z.object({
  safeTxGas: uintSchema,
})

export const paginatedSchema = <T>(
  item: Schema<T>
): Schema<IPaginatedResponse<T>> =>
  z.object({
    count: z.number().int().nonnegative(),
    next: nullable(z.string()),
    previous: nullable(z.string()),
    results: z.array(item),
  })

export const multisigHistorySchema = paginatedSchema(multisigTransactionSchema)
export const tokenListSchema = paginatedSchema(tokenInfoSchema)

// ============================================================================
// Request bodies
// ============================================================================

export interface IProposeRequestBody {
  to: Address
  value: string
  data: Hex | null
  operation: OperationTypeEnum
  safeTxGas: string
  baseGas: string
  gasPrice: string
  gasToken: Address
  refundReceiver: Address
  nonce: string
  contractTransactionHash: Hex
  sender: Address
  signature: Hex
  origin?: string
}

export interface IEstimateRequestBody {
  to: Address
  value: string
  data: Hex | null
  operation: OperationTypeEnum
}

const encodeData = (data: Hex | undefined): Hex | null =>
  data && data !== '0x' ? data : null

export const toProposeRequestBody = ({
  tx,
  contractTransactionHash,
  signature,
}: IProposeRequest): IProposeRequestBody => ({
  to: getAddress(tx.to),
  value: tx.value.toString(),
  data: encodeData(tx.data),
  operation: tx.operation ?? OperationTypeEnum.Call,
  safeTxGas: tx.safeTxGas.toString(),
  baseGas: tx.baseGas.toString(),
  gasPrice: tx.gasPrice.toString(),
  gasToken: getAddress(tx.gasToken),
  refundReceiver: getAddress(tx.refundReceiver),
  nonce: tx.nonce.toString(),
  contractTransactionHash,
  sender: getAddress(signature.sender),
  signature: signature.signature,
  ...(signature.origin !== undefined ? { origin: signature.origin } : {}),
})

export const toEstimateRequestBody = (
  tx: IEstimateRequest
): IEstimateRequestBody => ({
  to: getAddress(tx.to),
  value: tx.value.toString(),
  data: encodeData(tx.data),
  operation: tx.operation ?? OperationTypeEnum.Call,
})
