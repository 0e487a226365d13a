/**
 * Safe Transaction Types
 *
 * Value types shared by the encoder, the signer adapter and the service
 * client. All quantities are bigint; conversion to wire form happens in
 * safe-schemas.ts only.
 */

import type { Address, Hex } from 'viem'

export enum OperationTypeEnum {
  Call = 0,
  DelegateCall = 1,
}

export const ZERO_ADDRESS =
  '0x0000000000000000000000000000000000000000' as const satisfies Address

export interface IMetaTransactionData {
  to: Address
  value: bigint
  data?: Hex
  // unset is treated as Call when encoding
  operation?: OperationTypeEnum
}

export interface IGasConfig {
  safeTxGas: bigint
  baseGas: bigint
  gasPrice: bigint
  gasToken: Address
  refundReceiver: Address
}

export interface ISafeTransactionData extends IMetaTransactionData, IGasConfig {
  nonce: bigint
}

export interface IProposeSignature {
  sender: Address
  /** 65 bytes, r ‖ s ‖ v */
  signature: Hex
  origin?: string
}

export interface IProposeRequest {
  tx: Readonly<ISafeTransactionData>
  contractTransactionHash: Hex
  signature: IProposeSignature
}

export interface ISafeInfoResponse {
  address: Address
  nonce: bigint
  threshold: number
  owners: Address[]
  masterCopy: Address
  modules: Address[]
  fallbackHandler: Address
  guard: Address
  version?: string
}

export interface IPaginatedResponse<T> {
  count: number
  next: string | null
  previous: string | null
  results: T[]
}

export interface IConfirmation {
  owner: Address
  submissionDate: string
  transactionHash: Hex | null
  signature: Hex
  signatureType: string
}

export interface IDecodedParameter {
  name: string
  type: string
}

export interface IDecodedData {
  method: string
  parameters: IDecodedParameter[]
}

/**
 * The service's canonical record of a multisig transaction
 */
export interface IMultisigTransactionResponse {
  safe: Address
  to: Address
  value: bigint
  data: Hex | null
  operation: OperationTypeEnum
  gasToken: Address
  safeTxGas: bigint
  baseGas: bigint
  gasPrice: bigint
  refundReceiver: Address
  nonce: bigint
  executionDate: string | null
  submissionDate: string
  modified: string
  blockNumber: number | null
  transactionHash: Hex | null
  safeTxHash: Hex
  executor: Address | null
  isExecuted: boolean
  isSuccessful: boolean | null
  ethGasPrice: bigint | null
  maxFeePerGas: bigint | null
  maxPriorityFeePerGas: bigint | null
  gasUsed: number | null
  fee: bigint | null
  origin: string | null
  dataDecoded: IDecodedData | null
  confirmationsRequired: number | null
  confirmations: IConfirmation[]
  trusted: boolean
  signatures: Hex | null
}

export type MultisigHistoryResponse =
  IPaginatedResponse<IMultisigTransactionResponse>

export type TokenTypeEnum = 'ERC20' | 'ERC721' | 'ERC1155' | 'NATIVE_TOKEN'

export interface ITokenInfoResponse {
  type: TokenTypeEnum
  address: Address
  name: string
  symbol: string
  decimals: number | null
  logoUri: string | null
}

export type TokenListResponse = IPaginatedResponse<ITokenInfoResponse>

export interface IErc20Info {
  name: string
  symbol: string
  decimals: number | null
  logoUri: string | null
}

export interface IBalanceResponse {
  // null for the native asset
  tokenAddress: Address | null
  token: IErc20Info | null
  balance: bigint
}

export interface IEstimateRequest {
  to: Address
  value: bigint
  data?: Hex
  operation?: OperationTypeEnum
}

export type ProposalStatus =
  | 'executed'
  | 'ready_to_execute'
  | 'awaiting_confirmations'
  | 'pending'
