import { privateKeyToAccount } from 'viem/accounts'
import { describe, expect, it } from 'vitest'

import {
  SAFE_ADDRESS,
  SIGNER_KEY,
  TO_ADDRESS,
  wireRecord,
} from './fixtures/safe-service'
import { buildSafeTransaction } from './safe-encoding'
import {
  addressSchema,
  errorResponseSchema,
  multisigTransactionSchema,
  toEstimateRequestBody,
  toProposeRequestBody,
  uintSchema,
} from './safe-schemas'
import { buildProposeRequest } from './safe-signer'
import { OperationTypeEnum, ZERO_ADDRESS } from './safe-types'

const account = privateKeyToAccount(SIGNER_KEY)

describe('safe-schemas', () => {
  it('checksums addresses', () => {
    expect(
      addressSchema.parse('0xf39fd6e51aad88f6f4ce6ab8827279cfffb92266')
    ).toBe('0xf39Fd6e51aad88F6F4ce6aB8827279cffFb92266')
    expect(addressSchema.safeParse('0x1234').success).toBe(false)
  })

  it('reads uint256 values from decimal strings and small numbers', () => {
    expect(
      uintSchema.parse(
        '115792089237316195423570985008687907853269984665640564039457584007913129639935'
      )
    ).toBe(2n ** 256n - 1n)
    expect(uintSchema.parse(7)).toBe(7n)
    expect(uintSchema.safeParse('-1').success).toBe(false)
    expect(uintSchema.safeParse('0x10').success).toBe(false)
    expect(uintSchema.safeParse(1.5).success).toBe(false)
  })

  it('reads the structured error body', () => {
    expect(
      errorResponseSchema.parse({
        code: 1,
        message: 'Checksum address validation failed',
      })
    ).toEqual({
      code: 1,
      message: 'Checksum address validation failed',
      arguments: [],
    })
    expect(errorResponseSchema.safeParse({ nonce: '1' }).success).toBe(false)
  })

  it('encodes a proposal with decimal quantities and null empty data', async () => {
    const tx = buildSafeTransaction(
      { to: TO_ADDRESS, value: 2n ** 70n, data: '0x' },
      12n,
      { safeTxGas: 21_000n }
    )
    const request = await buildProposeRequest(
      tx,
      SAFE_ADDRESS,
      5,
      account,
      'ops'
    )

    expect(toProposeRequestBody(request)).toEqual({
      to: TO_ADDRESS,
      value: '1180591620717411303424',
      data: null,
      operation: OperationTypeEnum.Call,
      safeTxGas: '21000',
      baseGas: '0',
      gasPrice: '0',
      gasToken: ZERO_ADDRESS,
      refundReceiver: ZERO_ADDRESS,
      nonce: '12',
      contractTransactionHash: request.contractTransactionHash,
      sender: account.address,
      signature: request.signature.signature,
      origin: 'ops',
    })
  })

  it('round-trips a proposal through the service record', async () => {
    const tx = buildSafeTransaction(
      {
        to: TO_ADDRESS,
        value: 10n ** 18n,
        data: '0xdeadbeef',
        operation: OperationTypeEnum.DelegateCall,
      },
      9n
    )
    const request = await buildProposeRequest(tx, SAFE_ADDRESS, 5, account)
    const body = toProposeRequestBody(request)

    const record = multisigTransactionSchema.parse(
      wireRecord(9, {
        to: body.to.toLowerCase(),
        value: body.value,
        data: body.data,
        operation: body.operation,
        safeTxHash: body.contractTransactionHash,
      })
    )

    expect(record.to).toBe(tx.to)
    expect(record.value).toBe(tx.value)
    expect(record.data).toBe(tx.data)
    expect(record.operation).toBe(OperationTypeEnum.DelegateCall)
    expect(record.nonce).toBe(tx.nonce)
    expect(record.safeTxHash).toBe(request.contractTransactionHash)
  })

  it('fills defaults for fields older services leave out', () => {
    const { confirmations: _confirmations, trusted: _trusted, ...rest } =
      wireRecord(1)
    const record = multisigTransactionSchema.parse({
      ...rest,
      gasToken: null,
      refundReceiver: undefined,
    })

    expect(record.confirmations).toEqual([])
    expect(record.trusted).toBe(false)
    expect(record.gasToken).toBe(ZERO_ADDRESS)
    expect(record.refundReceiver).toBe(ZERO_ADDRESS)
  })

  it('encodes an estimation request', () => {
    expect(
      toEstimateRequestBody({ to: TO_ADDRESS, value: 3n, data: '0xabcd' })
    ).toEqual({
      to: TO_ADDRESS,
      value: '3',
      data: '0xabcd',
      operation: OperationTypeEnum.Call,
    })
  })
})
