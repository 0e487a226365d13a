/**
 * SafeServiceClient class
 *
 * Client for one Safe Transaction Service deployment. Reads work without a
 * signer; proposing needs one, attached with `withSigner`. Every proposal a
 * signing client builds is appended to its ProposalLog before submission.
 */

import { consola } from 'consola'
import { getAddress, isAddressEqual, type Address, type Hex } from 'viem'

import type { ITxService } from '../common/types'

import { SafeApiHttp, type FetchLike } from './safe-api-http'
import { buildSafeTransaction, getSafeTxHash } from './safe-encoding'
import { SafeClientError, SafeClientErrorCode } from './safe-errors'
import { paginate } from './safe-pagination'
import { ProposalLog, type IProposalLogEntry } from './proposal-log'
import {
  BalancesFilters,
  MultisigHistoryFilters,
  TokenListFilters,
} from './safe-query-filters'
import {
  balancesSchema,
  estimateResponseSchema,
  multisigHistorySchema,
  multisigTransactionSchema,
  safeInfoSchema,
  toEstimateRequestBody,
  toProposeRequestBody,
  tokenListSchema,
} from './safe-schemas'
import {
  buildProposeRequest,
  packageSignature,
  signDigest,
  type ISafeDigestSigner,
} from './safe-signer'
import {
  OperationTypeEnum,
  type IBalanceResponse,
  type IEstimateRequest,
  type IGasConfig,
  type IMetaTransactionData,
  type IMultisigTransactionResponse,
  type IProposeRequest,
  type ISafeInfoResponse,
  type ISafeTransactionData,
  type ITokenInfoResponse,
  type MultisigHistoryResponse,
  type ProposalStatus,
  type TokenListResponse,
} from './safe-types'
import {
  createCustomTxService,
  getTxServiceByChainId,
  getTxServiceByNetwork,
} from './tx-services'

export type ProposalState =
  | 'built'
  | 'hashed'
  | 'signed'
  | 'submitted'
  | 'confirmed'
  | 'errored'

export interface IProposalStateDetails {
  safeAddress: Address
  nonce?: bigint
  safeTxHash?: Hex
  error?: unknown
}

export interface IProposeOptions {
  gas?: Partial<IGasConfig>
  origin?: string
  onStateChange?: (state: ProposalState, details: IProposalStateDetails) => void
}

export interface ISafeServiceClientOptions {
  fetch?: FetchLike
}

/**
 * A generic transaction request, as a wallet or script would produce it
 */
export interface ITransactionRequest {
  to?: Address
  value?: bigint
  data?: Hex
}

export interface IRelayOptions {
  gas?: Partial<IGasConfig>
  origin?: string
  // when false the proposal is only signed and logged
  submit?: boolean
}

export interface IRelayResult {
  proposal: IProposeRequest
  record: IMultisigTransactionResponse | null
}

export class SafeServiceClient {
  private readonly http: SafeApiHttp
  private readonly fetchFn: FetchLike | undefined

  public constructor(
    public readonly service: ITxService,
    options: ISafeServiceClientOptions = {},
    private readonly signer: ISafeDigestSigner | null = null,
    private readonly log: ProposalLog = new ProposalLog()
  ) {
    this.http = new SafeApiHttp(options.fetch)
    this.fetchFn = options.fetch
  }

  public static fromChainId(
    chainId: number,
    options: ISafeServiceClientOptions = {}
  ): SafeServiceClient {
    return new SafeServiceClient(getTxServiceByChainId(chainId), options)
  }

  public static fromNetwork(
    network: string,
    options: ISafeServiceClientOptions = {}
  ): SafeServiceClient {
    return new SafeServiceClient(getTxServiceByNetwork(network), options)
  }

  public static fromUrl(
    chainId: number,
    url: string,
    options: ISafeServiceClientOptions = {}
  ): SafeServiceClient {
    return new SafeServiceClient(createCustomTxService(chainId, url), options)
  }

  /**
   * Returns a client for the same service that signs with `signer`. The two
   * clients share a proposal log.
   */
  public withSigner(signer: ISafeDigestSigner): SafeServiceClient {
    return new SafeServiceClient(
      this.service,
      { fetch: this.fetchFn },
      signer,
      this.log
    )
  }

  public get chainId(): number {
    return this.service.chainId
  }

  public get signerAddress(): Address | null {
    return this.signer?.address ?? null
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  public async getSafeInfo(safeAddress: Address): Promise<ISafeInfoResponse> {
    return this.http.get(this.safeUrl(safeAddress), safeInfoSchema)
  }

  /**
   * One page of the Safe's multisig history
   */
  public async getMultisigTransactions(
    safeAddress: Address,
    filters: MultisigHistoryFilters = new MultisigHistoryFilters()
  ): Promise<MultisigHistoryResponse> {
    return this.http.get(
      this.safeUrl(safeAddress, 'multisig-transactions/'),
      multisigHistorySchema,
      filters.toQuery()
    )
  }

  /**
   * Every multisig transaction of the Safe matching `filters`, across pages.
   * Each call starts again from the first page.
   */
  public streamMultisigHistory(
    safeAddress: Address,
    filters: MultisigHistoryFilters = new MultisigHistoryFilters()
  ): AsyncGenerator<IMultisigTransactionResponse, void, undefined> {
    return paginate(
      this.http,
      this.safeUrl(safeAddress, 'multisig-transactions/'),
      multisigHistorySchema,
      filters.toQuery()
    )
  }

  /**
   * Highest nonce in the Safe's multisig history plus one, or 0 for a Safe
   * without history. Walks the whole history; nonces are not assumed to be
   * contiguous.
   */
  public async getNextNonce(safeAddress: Address): Promise<bigint> {
    let highest: bigint | null = null
    for await (const tx of this.streamMultisigHistory(safeAddress))
      if (highest === null || tx.nonce > highest) highest = tx.nonce

    const next = highest === null ? 0n : highest + 1n
    consola.debug(`Next nonce for ${safeAddress}: ${next}`)
    return next
  }

  /**
   * The service's canonical record for a safeTxHash
   */
  public async getTransaction(
    safeTxHash: Hex
  ): Promise<IMultisigTransactionResponse> {
    return this.http.get(
      new URL(`v1/multisig-transactions/${safeTxHash}/`, this.service.url),
      multisigTransactionSchema
    )
  }

  public async estimateSafeTxGas(
    safeAddress: Address,
    tx: IEstimateRequest
  ): Promise<bigint> {
    const { safeTxGas } = await this.http.post(
      this.safeUrl(safeAddress, 'multisig-transactions/estimations/'),
      toEstimateRequestBody(tx),
      estimateResponseSchema
    )
    return safeTxGas
  }

  public async getTokens(
    filters: TokenListFilters = new TokenListFilters()
  ): Promise<TokenListResponse> {
    return this.http.get(
      new URL('v1/tokens/', this.service.url),
      tokenListSchema,
      filters.toQuery()
    )
  }

  public streamTokens(
    filters: TokenListFilters = new TokenListFilters()
  ): AsyncGenerator<ITokenInfoResponse, void, undefined> {
    return paginate(
      this.http,
      new URL('v1/tokens/', this.service.url),
      tokenListSchema,
      filters.toQuery()
    )
  }

  public async getBalances(
    safeAddress: Address,
    filters: BalancesFilters = new BalancesFilters()
  ): Promise<IBalanceResponse[]> {
    return this.http.get(
      this.safeUrl(safeAddress, 'balances/'),
      balancesSchema,
      filters.toQuery()
    )
  }

  // ==========================================================================
  // Proposals
  // ==========================================================================

  /**
   * Proposes a meta transaction at the next free nonce and returns the
   * service's record of it
   */
  public async propose(
    meta: IMetaTransactionData,
    safeAddress: Address,
    options: IProposeOptions = {}
  ): Promise<IMultisigTransactionResponse> {
    this.requireSigner()

    let nonce: bigint
    try {
      nonce = await this.getNextNonce(safeAddress)
    } catch (error) {
      this.transition(options, 'errored', { safeAddress, error })
      throw error
    }

    return this.proposeTransaction(
      buildSafeTransaction(meta, nonce, options.gas),
      safeAddress,
      options
    )
  }

  /**
   * Hashes, signs, logs and submits a fully built transaction, then fetches
   * the service's record of it
   */
  public async proposeTransaction(
    tx: Readonly<ISafeTransactionData>,
    safeAddress: Address,
    options: IProposeOptions = {}
  ): Promise<IMultisigTransactionResponse> {
    const signer = this.requireSigner()
    const details: IProposalStateDetails = { safeAddress, nonce: tx.nonce }
    this.transition(options, 'built', details)

    try {
      const safeTxHash = getSafeTxHash(tx, safeAddress, this.chainId)
      details.safeTxHash = safeTxHash
      this.transition(options, 'hashed', details)

      const signature = await signDigest(signer, safeTxHash)
      const request: IProposeRequest = {
        tx,
        contractTransactionHash: safeTxHash,
        signature: packageSignature(signer, signature, options.origin),
      }
      this.log.append(safeAddress, request)
      this.transition(options, 'signed', details)

      await this.postProposal(request, safeAddress)
      this.transition(options, 'submitted', details)

      const record = await this.getTransaction(safeTxHash)
      this.transition(options, 'confirmed', details)
      return record
    } catch (error) {
      this.transition(options, 'errored', { ...details, error })
      throw error
    }
  }

  /**
   * Submits an already signed proposal and returns the service's record of
   * it. The proposal must carry this client's signer as sender.
   */
  public async submitProposal(
    request: IProposeRequest,
    safeAddress: Address
  ): Promise<IMultisigTransactionResponse> {
    const signer = this.requireSigner()
    if (!isAddressEqual(request.signature.sender, signer.address))
      throw new SafeClientError(
        `Proposal sender ${request.signature.sender} is not the client signer ${signer.address}`,
        SafeClientErrorCode.WRONG_SIGNER,
        { sender: request.signature.sender, signer: signer.address }
      )

    await this.postProposal(request, safeAddress)
    return this.getTransaction(request.contractTransactionHash)
  }

  /**
   * Turns a generic transaction request into a Call proposal at the Safe's
   * current on-chain nonce. The proposal is logged, and submitted only when
   * `options.submit` is set.
   */
  public async relayTransactionRequest(
    request: ITransactionRequest,
    safeAddress: Address,
    options: IRelayOptions = {}
  ): Promise<IRelayResult> {
    const signer = this.requireSigner()
    if (!request.to)
      throw new SafeClientError(
        'Transaction request has no `to` address',
        SafeClientErrorCode.MISSING_TO
      )

    const { nonce } = await this.getSafeInfo(safeAddress)
    const tx = buildSafeTransaction(
      {
        to: request.to,
        value: request.value ?? 0n,
        data: request.data,
        operation: OperationTypeEnum.Call,
      },
      nonce,
      options.gas
    )
    const proposal = await buildProposeRequest(
      tx,
      safeAddress,
      this.chainId,
      signer,
      options.origin
    )
    this.log.append(safeAddress, proposal)

    if (!options.submit) return { proposal, record: null }
    return { proposal, record: await this.submitProposal(proposal, safeAddress) }
  }

  /**
   * Every proposal this client (and clients sharing its log) has signed
   */
  public proposals(): ReadonlyArray<Readonly<IProposalLogEntry>> {
    return this.log.snapshot()
  }

  private async postProposal(
    request: IProposeRequest,
    safeAddress: Address
  ): Promise<void> {
    await this.http.postWithoutContent(
      this.safeUrl(safeAddress, 'multisig-transactions/'),
      toProposeRequestBody(request)
    )
  }

  private requireSigner(): ISafeDigestSigner {
    if (!this.signer)
      throw new SafeClientError(
        'This client has no signer; attach one with withSigner()',
        SafeClientErrorCode.NO_SIGNER
      )
    return this.signer
  }

  private safeUrl(safeAddress: Address, path = ''): URL {
    return new URL(
      `v1/safes/${getAddress(safeAddress)}/${path}`,
      this.service.url
    )
  }

  private transition(
    options: IProposeOptions,
    state: ProposalState,
    details: IProposalStateDetails
  ): void {
    consola.debug(
      `Proposal for ${details.safeAddress} -> ${state}${
        details.safeTxHash ? ` (${details.safeTxHash})` : ''
      }`
    )
    options.onStateChange?.(state, { ...details })
  }
}

/**
 * Where a proposal stands, judged from the service's record alone
 */
export const getProposalStatus = (
  record: IMultisigTransactionResponse
): ProposalStatus => {
  if (record.isExecuted) return 'executed'
  if (
    record.confirmationsRequired !== null &&
    record.confirmations.length >= record.confirmationsRequired
  )
    return 'ready_to_execute'
  if (record.confirmations.length > 0) return 'awaiting_confirmations'
  return 'pending'
}
