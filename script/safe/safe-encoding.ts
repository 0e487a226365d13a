/**
 * Safe Transaction Encoding
 *
 * EIP-712 struct encoding and hashing for the SafeTx type, computed locally
 * rather than through the Safe contract's getTransactionHash view, so that a
 * proposal can be hashed without an RPC connection.
 *
 * Pipeline: encodeSafeTxStruct -> getSafeTxStructHash -> getDomainSeparator
 * -> getSafeTxHash. Every step is pure.
 */

import {
  concat,
  encodeAbiParameters,
  keccak256,
  toHex,
  type Address,
  type Hex,
} from 'viem'

import {
  OperationTypeEnum,
  ZERO_ADDRESS,
  type IGasConfig,
  type IMetaTransactionData,
  type ISafeTransactionData,
} from './safe-types'

export const SAFE_TX_TYPE =
  'SafeTx(address to,uint256 value,bytes data,uint8 operation,uint256 safeTxGas,uint256 baseGas,uint256 gasPrice,address gasToken,address refundReceiver,uint256 nonce)'

export const DOMAIN_SEPARATOR_TYPE =
  'EIP712Domain(uint256 chainId,address verifyingContract)'

// computed once at module load
export const SAFE_TX_TYPEHASH: Hex = keccak256(toHex(SAFE_TX_TYPE))
export const DOMAIN_SEPARATOR_TYPEHASH: Hex = keccak256(
  toHex(DOMAIN_SEPARATOR_TYPE)
)

const EIP712_PREFIX: Hex = '0x1901'

const SAFE_TX_STRUCT_PARAMETERS = [
  { name: 'typeHash', type: 'bytes32' },
  { name: 'to', type: 'address' },
  { name: 'value', type: 'uint256' },
  { name: 'dataHash', type: 'bytes32' },
  { name: 'operation', type: 'uint8' },
  { name: 'safeTxGas', type: 'uint256' },
  { name: 'baseGas', type: 'uint256' },
  { name: 'gasPrice', type: 'uint256' },
  { name: 'gasToken', type: 'address' },
  { name: 'refundReceiver', type: 'address' },
  { name: 'nonce', type: 'uint256' },
] as const

const DOMAIN_PARAMETERS = [
  { name: 'typeHash', type: 'bytes32' },
  { name: 'chainId', type: 'uint256' },
  { name: 'verifyingContract', type: 'address' },
] as const

export const DEFAULT_GAS_CONFIG: Readonly<IGasConfig> = Object.freeze({
  safeTxGas: 0n,
  baseGas: 0n,
  gasPrice: 0n,
  gasToken: ZERO_ADDRESS,
  refundReceiver: ZERO_ADDRESS,
})

/**
 * Builds a frozen SafeTx from a meta transaction, a nonce and optional gas
 * settings. Gas fields left out or `undefined` take their zero defaults.
 * `operation` is copied as given; defaulting happens at encode time.
 */
export const buildSafeTransaction = (
  meta: IMetaTransactionData,
  nonce: bigint,
  gas: Partial<IGasConfig> = {}
): Readonly<ISafeTransactionData> =>
  Object.freeze({
    safeTxGas: gas.safeTxGas ?? DEFAULT_GAS_CONFIG.safeTxGas,
    baseGas: gas.baseGas ?? DEFAULT_GAS_CONFIG.baseGas,
    gasPrice: gas.gasPrice ?? DEFAULT_GAS_CONFIG.gasPrice,
    gasToken: gas.gasToken ?? DEFAULT_GAS_CONFIG.gasToken,
    refundReceiver: gas.refundReceiver ?? DEFAULT_GAS_CONFIG.refundReceiver,
    to: meta.to,
    value: meta.value,
    data: meta.data,
    operation: meta.operation,
    nonce,
  })

/**
 * ABI-encodes the SafeTx struct tuple:
 * (typehash, to, value, keccak(data), operation, safeTxGas, baseGas,
 * gasPrice, gasToken, refundReceiver, nonce)
 */
export const encodeSafeTxStruct = (tx: Readonly<ISafeTransactionData>): Hex =>
  encodeAbiParameters(SAFE_TX_STRUCT_PARAMETERS, [
    SAFE_TX_TYPEHASH,
    tx.to,
    tx.value,
    // absent data hashes as the empty byte string, never as zero bytes
    keccak256(tx.data ?? '0x'),
    tx.operation ?? OperationTypeEnum.Call,
    tx.safeTxGas,
    tx.baseGas,
    tx.gasPrice,
    tx.gasToken,
    tx.refundReceiver,
    tx.nonce,
  ])

export const getSafeTxStructHash = (tx: Readonly<ISafeTransactionData>): Hex =>
  keccak256(encodeSafeTxStruct(tx))

/**
 * Domain separator binding a signature to one Safe on one chain
 */
export const getDomainSeparator = (
  chainId: number | bigint,
  safeAddress: Address
): Hex =>
  keccak256(
    encodeAbiParameters(DOMAIN_PARAMETERS, [
      DOMAIN_SEPARATOR_TYPEHASH,
      BigInt(chainId),
      safeAddress,
    ])
  )

/**
 * The safeTxHash: keccak256(0x19 ‖ 0x01 ‖ domainSeparator ‖ structHash)
 */
export const getSafeTxHash = (
  tx: Readonly<ISafeTransactionData>,
  safeAddress: Address,
  chainId: number | bigint
): Hex =>
  keccak256(
    concat([
      EIP712_PREFIX,
      getDomainSeparator(chainId, safeAddress),
      getSafeTxStructHash(tx),
    ])
  )
