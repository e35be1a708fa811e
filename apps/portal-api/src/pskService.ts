import {randomUUID} from 'node:crypto'

import {generatePskSecret, hashPskSecret, validatePsk} from '@ovpn-portal/auth'
import type {PskRepository} from '@ovpn-portal/db'
import type {StructuredLogger} from '@ovpn-portal/logging'
import {PskRecordSchema, type PskCreateRequest, type PskRecord, type PskType} from '@ovpn-portal/schemas'

import type {PskPrincipal} from './accessControl'
import {badRequest, fromPskError, notFound} from './errors'

export type CreatedPsk = {
  psk: PskRecord
  // Plaintext; only ever placed in the creation response.
  secret: string
}

export class PskService {
  private readonly now: () => Date

  public constructor(
    private readonly dependencies: {
      repository: PskRepository
      logger: StructuredLogger
      templateSetNames: readonly string[]
      now?: () => Date
    }
  ) {
    this.now = dependencies.now ?? (() => new Date())
  }

  public list() {
    return this.dependencies.repository.list()
  }

  public async create({request, actor}: {request: PskCreateRequest; actor: string}): Promise<CreatedPsk> {
    if (!this.dependencies.templateSetNames.includes(request.template_set)) {
      throw badRequest('template_set_unknown', 'Template set is not configured')
    }

    const now = this.now()
    if (request.expires_at !== undefined && new Date(request.expires_at).getTime() <= now.getTime()) {
      throw badRequest('request_invalid', 'expires_at must be in the future')
    }

    const secret = generatePskSecret()
    const record = PskRecordSchema.parse({
      psk_id: randomUUID(),
      description: request.description,
      psk_type: request.psk_type,
      template_set: request.template_set,
      created_by: actor,
      created_at: now.toISOString(),
      expires_at: request.expires_at === undefined ? null : new Date(request.expires_at).toISOString(),
      revoked_at: null,
      last_used_at: null
    })

    const psk = await this.dependencies.repository.create({record, secretHash: hashPskSecret(secret)})
    this.dependencies.logger.info({
      event: 'psk.created',
      component: 'psk.service',
      message: 'Pre-shared key created',
      metadata: {psk_id: psk.psk_id, psk_type: psk.psk_type, template_set: psk.template_set, actor}
    })

    return {psk, secret}
  }

  public async revoke({pskId, actor}: {pskId: string; actor: string}) {
    const revoked = await this.dependencies.repository.revoke({pskId, revokedAt: this.now()})
    if (!revoked) {
      throw notFound('psk_not_found', 'Pre-shared key not found')
    }

    this.dependencies.logger.info({
      event: 'psk.revoked',
      component: 'psk.service',
      message: 'Pre-shared key revoked',
      metadata: {psk_id: revoked.psk_id, actor}
    })

    return revoked
  }

  /** Resolves a bearer credential to a PSK principal, or throws the mapped 401/403. */
  public async authenticate({
    candidate,
    expectedType
  }: {
    candidate: string | undefined
    expectedType: PskType
  }): Promise<PskPrincipal> {
    const now = this.now()
    const result = await validatePsk({
      candidate,
      expectedType,
      lookup: secretHash => this.dependencies.repository.findCredentialByHash(secretHash),
      now
    })

    if (!result.ok) {
      this.dependencies.logger.warn({
        event: 'psk.rejected',
        component: 'psk.service',
        message: 'Pre-shared key rejected',
        reason_code: result.error.code,
        metadata: {expected_type: expectedType}
      })
      throw fromPskError(result.error.code)
    }

    const credential = result.value
    await this.dependencies.repository.touchLastUsed({pskId: credential.pskId, usedAt: now})

    return {
      kind: 'psk',
      pskId: credential.pskId,
      pskType: credential.pskType,
      templateSet: credential.templateSet,
      description: credential.description
    }
  }
}
