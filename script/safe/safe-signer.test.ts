import { hashMessage, recoverAddress, type Hex } from 'viem'
import { privateKeyToAccount } from 'viem/accounts'
import { describe, expect, it } from 'vitest'

import { SAFE_ADDRESS, SIGNER_KEY, TO_ADDRESS } from './fixtures/safe-service'
import { buildSafeTransaction, getSafeTxHash } from './safe-encoding'
import { SafeClientError, SafeSignerError } from './safe-errors'
import {
  buildProposeRequest,
  signDigest,
  signSafeTransaction,
  type ISafeDigestSigner,
} from './safe-signer'

// first default account of the local development node
const DEV_KEY: Hex =
  '0xac0974bec39a17e36ba4a6b4d238ff944bacb478cbed5efcae784d7bf4f2ff80'

const SHORT_SIGNATURE: Hex = `0x${'ab'.repeat(64)}`

const account = privateKeyToAccount(SIGNER_KEY)
const tx = buildSafeTransaction(
  { to: TO_ADDRESS, value: 5n, data: '0x12345678' },
  3n
)

describe('signDigest', () => {
  it('signs the digest as is, without a message prefix', async () => {
    const devAccount = privateKeyToAccount(DEV_KEY)
    expect(devAccount.address).toBe('0xf39Fd6e51aad88F6F4ce6aB8827279cffFb92266')

    const signature = await signDigest(devAccount, hashMessage('hello world'))
    expect(signature).toBe(
      '0xa461f509887bd19e312c0c58467ce8ff8e300d3c1a90b608a760c5b80318eaf15fe57c96f9175d6cd4daad4663763baa7e78836e067d0163e9a2ccf2ff753f5b1b'
    )
    expect(signature).toBe(
      await devAccount.signMessage({ message: 'hello world' })
    )
  })

  it('routes a failing signer to SafeSignerError', async () => {
    const cause = new Error('device locked')
    const signer: ISafeDigestSigner = {
      address: account.address,
      sign: async () => {
        throw cause
      },
    }

    const error = await signDigest(signer, hashMessage('x')).catch(
      (e: unknown) => e
    )
    expect(error).toBeInstanceOf(SafeSignerError)
    expect(error).not.toBeInstanceOf(SafeClientError)
    expect(error).toMatchObject({ cause })
  })

  it('rejects a signature that is not 65 bytes', async () => {
    const signer: ISafeDigestSigner = {
      address: account.address,
      sign: async () => SHORT_SIGNATURE,
    }

    await expect(signDigest(signer, hashMessage('x'))).rejects.toBeInstanceOf(
      SafeSignerError
    )
  })
})

describe('signSafeTransaction', () => {
  it('packages a signature recoverable to the signer', async () => {
    const signed = await signSafeTransaction(
      tx,
      SAFE_ADDRESS,
      5,
      account,
      'tests'
    )

    expect(signed.sender).toBe(account.address)
    expect(signed.origin).toBe('tests')
    expect(
      await recoverAddress({
        hash: getSafeTxHash(tx, SAFE_ADDRESS, 5),
        signature: signed.signature,
      })
    ).toBe(account.address)
  })

  it('signs the EIP-712 digest for a fixed transaction, chain and Safe', async () => {
    expect(account.address).toBe('0x19E7E376E7C213B7E7e7e46cc70A5dD086DAff2A')
    expect(getSafeTxHash(tx, SAFE_ADDRESS, 5)).toBe(
      '0x6d466a00429abedf2de61057bd07c85009e52309cac26bc866f2cfa0816d018b'
    )

    const signed = await signSafeTransaction(tx, SAFE_ADDRESS, 5, account)
    expect(signed.signature).toBe(
      '0x725341eca92c939c66b19b2c99ac2c56f84ffc41397ee591d6c8e749104112ba2c152958519d8cec3e5d2d9eff7908b3b996b5a240eb686d4e8afcb3cb4ee0841c'
    )
  })

  it('leaves origin out when none is given', async () => {
    const signed = await signSafeTransaction(tx, SAFE_ADDRESS, 5, account)
    expect('origin' in signed).toBe(false)
  })
})

describe('buildProposeRequest', () => {
  it('uses the signed safeTxHash as contractTransactionHash', async () => {
    const request = await buildProposeRequest(tx, SAFE_ADDRESS, 5, account)

    expect(request.tx).toBe(tx)
    expect(request.contractTransactionHash).toBe(
      getSafeTxHash(tx, SAFE_ADDRESS, 5)
    )
    expect(
      await recoverAddress({
        hash: request.contractTransactionHash,
        signature: request.signature.signature,
      })
    ).toBe(account.address)
  })
})
