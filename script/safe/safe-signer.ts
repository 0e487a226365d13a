/**
 * Safe Signer Adapter
 *
 * Signs the safeTxHash with an injected signing capability and packages the
 * result for the Safe Transaction Service. The capability only has to sign a
 * raw 32-byte digest and report its address; a viem LocalAccount
 * (privateKeyToAccount, mnemonicToAccount, toAccount over a hardware wallet)
 * fits as is.
 */

import { size, type Address, type Hex } from 'viem'

import { getSafeTxHash } from './safe-encoding'
import { SafeSignerError, getErrorMessage } from './safe-errors'
import type {
  IProposeRequest,
  IProposeSignature,
  ISafeTransactionData,
} from './safe-types'

export interface ISafeDigestSigner {
  address: Address
  // signs the digest as is, without the eth_sign message prefix
  sign: (parameters: { hash: Hex }) => Promise<Hex>
}

const SIGNATURE_LENGTH = 65

/**
 * Signs a digest, routing every failure of the capability to SafeSignerError
 */
export const signDigest = async (
  signer: ISafeDigestSigner,
  hash: Hex
): Promise<Hex> => {
  let signature: Hex
  try {
    signature = await signer.sign({ hash })
  } catch (error) {
    throw new SafeSignerError(
      `Signer ${signer.address} failed to sign ${hash}: ${getErrorMessage(
        error
      )}`,
      { cause: error }
    )
  }

  if (!signature.startsWith('0x') || size(signature) !== SIGNATURE_LENGTH)
    throw new SafeSignerError(
      `Invalid signature format from signer. Expected 0x + 130 hex chars but got: ${signature}`
    )

  return signature
}

/**
 * Packages a digest signature the way the service expects it
 */
export const packageSignature = (
  signer: ISafeDigestSigner,
  signature: Hex,
  origin?: string
): IProposeSignature => ({
  sender: signer.address,
  signature,
  ...(origin !== undefined ? { origin } : {}),
})

/**
 * Signs the safeTxHash of `tx` for the given Safe and chain
 */
export const signSafeTransaction = async (
  tx: Readonly<ISafeTransactionData>,
  safeAddress: Address,
  chainId: number | bigint,
  signer: ISafeDigestSigner,
  origin?: string
): Promise<IProposeSignature> => {
  const safeTxHash = getSafeTxHash(tx, safeAddress, chainId)
  return packageSignature(signer, await signDigest(signer, safeTxHash), origin)
}

/**
 * Hashes and signs `tx`, and packages it as a proposal for the service.
 * `contractTransactionHash` is the same digest that was signed.
 */
export const buildProposeRequest = async (
  tx: Readonly<ISafeTransactionData>,
  safeAddress: Address,
  chainId: number | bigint,
  signer: ISafeDigestSigner,
  origin?: string
): Promise<IProposeRequest> => {
  const contractTransactionHash = getSafeTxHash(tx, safeAddress, chainId)
  const signature = await signDigest(signer, contractTransactionHash)

  return {
    tx,
    contractTransactionHash,
    signature: packageSignature(signer, signature, origin),
  }
}
