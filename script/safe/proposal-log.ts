import type { Address } from 'viem'

import type { IProposeRequest } from './safe-types'

export interface IProposalLogEntry {
  safeAddress: Address
  request: Readonly<IProposeRequest>
  loggedAt: Date
}

const freezeRequest = (request: IProposeRequest): Readonly<IProposeRequest> =>
  Object.freeze({
    tx: Object.freeze({ ...request.tx }),
    contractTransactionHash: request.contractTransactionHash,
    signature: Object.freeze({ ...request.signature }),
  })

/**
 * Append-only record of every proposal a client has signed, kept whether or
 * not the submission later succeeded. Each entry holds a frozen copy of the
 * request, so callers keeping the original cannot rewrite the log.
 */
export class ProposalLog {
  private readonly entries: Readonly<IProposalLogEntry>[] = []

  public append(safeAddress: Address, request: IProposeRequest): void {
    this.entries.push(
      Object.freeze({
        safeAddress,
        request: freezeRequest(request),
        loggedAt: new Date(),
      })
    )
  }

  public get size(): number {
    return this.entries.length
  }

  /**
   * Point-in-time copy; later appends do not show up in it
   */
  public snapshot(): ReadonlyArray<Readonly<IProposalLogEntry>> {
    return Object.freeze([...this.entries])
  }
}
