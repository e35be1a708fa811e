import {Controller, Get, Inject, Post, Req, Res} from '@nestjs/common'
import type {Request, Response} from 'express'
import {deriveCsrfToken} from '@ovpn-portal/auth'
import {RevocationReasonSchema} from '@ovpn-portal/schemas'
import {normalizeCertificateQuery} from '@ovpn-portal/transparency'
import {z} from 'zod'

import {assertAllowed, authorize} from '../../accessControl'
import {toCommonName} from '../../certificateService'
import {sendAttachment, sendJson, validateBodyFields} from '../../http'
import {findTemplateSet, profileFilename, renderClientProfile, selectTemplateSetName} from '../../profiles'
import {PortalControllerContext, unwrapTransparency} from '../controllerContext'

const checkboxField = z.preprocess(value => {
  if (typeof value !== 'string') {
    return value
  }

  return ['true', '1', 'on', 'yes'].includes(value.trim().toLowerCase())
}, z.boolean())

const portField = z.preprocess(value => {
  if (typeof value !== 'string') {
    return value
  }

  const trimmed = value.trim()
  if (trimmed.length === 0) {
    return undefined
  }

  return /^\d+$/u.test(trimmed) ? Number.parseInt(trimmed, 10) : value
}, z.number().int().min(1).max(65_535).optional())

export const ProfileRequestSchema = z
  .object({
    use_tcp: checkboxField.default(false),
    custom_port: portField
  })
  .strict()

export const RevokeRequestSchema = z
  .object({
    reason: RevocationReasonSchema.default('unspecified')
  })
  .strict()

@Controller()
export class ProfileController {
  public constructor(@Inject(PortalControllerContext) private readonly context: PortalControllerContext) {}

  @Get('/profile')
  public async options(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      handler: async ({correlationId}) => {
        const {session, principal} = await this.context.requireSession({request})
        assertAllowed(authorize(principal, 'profile.issue'))

        const templateSet = findTemplateSet(
          this.context.config.profiles.templateSets,
          selectTemplateSetName({groups: session.groups, mappings: this.context.config.profiles.templateGroups})
        )
        sendJson({
          response,
          status: 200,
          correlationId,
          payload: {
            subject: session.subject,
            display_name: session.displayName,
            template_set: templateSet.name,
            remote_host: templateSet.remote_host,
            default_port: templateSet.port,
            default_protocol: templateSet.protocol,
            protocols: ['udp', 'tcp'],
            csrf_token: deriveCsrfToken(session)
          }
        })
      }
    })
  }

  @Post('/profile')
  public async issue(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      handler: async ({correlationId}) => {
        const {session, principal} = await this.context.requireSession({request})
        const fields = await this.context.readProtectedBody({request, session})
        const body = validateBodyFields({fields, schema: ProfileRequestSchema})

        const templateSet = findTemplateSet(
          this.context.config.profiles.templateSets,
          selectTemplateSetName({groups: session.groups, mappings: this.context.config.profiles.templateGroups})
        )
        const commonName = toCommonName(session.subject)
        const issued = await this.context.services.certificates.issue({
          type: 'client',
          commonName,
          principal,
          actor: session.subject
        })

        sendAttachment({
          response,
          correlationId,
          filename: profileFilename(commonName),
          contentType: 'application/x-openvpn-profile',
          content: renderClientProfile({
            templateSet,
            issued,
            tlsCryptKey: this.context.config.profiles.tlsCryptKey,
            options: {
              useTcp: body.use_tcp,
              ...(body.custom_port !== undefined ? {customPort: body.custom_port} : {})
            }
          })
        })
      }
    })
  }

  @Get('/profile/certificates')
  public async list(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      handler: async ({correlationId, url}) => {
        const {principal} = await this.context.requireSession({request})
        assertAllowed(authorize(principal, 'certificate.list_own'))

        const listing = unwrapTransparency(
          await this.context.services.transparency.list({
            query: normalizeCertificateQuery(Object.fromEntries(url.searchParams.entries())),
            view: 'full',
            ownerSubject: principal.subject
          })
        )
        sendJson({response, status: 200, correlationId, payload: listing})
      }
    })
  }

  @Get('/profile/certificates/:fingerprint')
  public async detail(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      handler: async ({correlationId}) => {
        const {principal} = await this.context.requireSession({request})
        const certificate = await this.context.services.certificates.read({
          principal,
          fingerprint: request.params['fingerprint']
        })
        sendJson({response, status: 200, correlationId, payload: {certificate}})
      }
    })
  }

  @Post('/profile/certificates/:fingerprint/revoke')
  public async revoke(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      handler: async ({correlationId}) => {
        const {session, principal} = await this.context.requireSession({request})
        const fields = await this.context.readProtectedBody({request, session})
        const body = validateBodyFields({fields, schema: RevokeRequestSchema})

        const outcome = await this.context.services.certificates.revoke({
          principal,
          fingerprint: request.params['fingerprint'],
          reason: body.reason,
          actor: session.subject
        })
        sendJson({
          response,
          status: 200,
          correlationId,
          payload: {certificate: outcome.certificate, already_revoked: outcome.alreadyRevoked}
        })
      }
    })
  }
}
