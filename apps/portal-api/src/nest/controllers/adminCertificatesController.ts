import {Controller, Get, Inject, Post, Req, Res} from '@nestjs/common'
import type {Request, Response} from 'express'
import {normalizeCertificateQuery} from '@ovpn-portal/transparency'
import {z} from 'zod'

import {assertAllowed, authorize} from '../../accessControl'
import {sendJson, validateBodyFields} from '../../http'
import {buildServerBundle, findTemplateSet} from '../../profiles'
import {PortalControllerContext, unwrapTransparency} from '../controllerContext'
import {RevokeRequestSchema} from './profileController'

export const ServerIssueRequestSchema = z
  .object({
    common_name: z.string().trim().min(1).max(64),
    template_set: z.string().trim().min(1).max(64).default('default')
  })
  .strict()

@Controller()
export class AdminCertificatesController {
  public constructor(@Inject(PortalControllerContext) private readonly context: PortalControllerContext) {}

  @Get('/admin/certificates')
  public async search(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      handler: async ({correlationId, url}) => {
        const {principal} = await this.context.requireSession({request})
        assertAllowed(authorize(principal, 'certificate.search'))

        const listing = unwrapTransparency(
          await this.context.services.transparency.list({
            query: normalizeCertificateQuery(Object.fromEntries(url.searchParams.entries())),
            view: 'full'
          })
        )
        sendJson({response, status: 200, correlationId, payload: listing})
      }
    })
  }

  @Post('/admin/certificates/server')
  public async issueServer(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      handler: async ({correlationId}) => {
        const {session, principal} = await this.context.requireSession({request})
        assertAllowed(authorize(principal, 'certificate.issue_server'))

        const fields = await this.context.readProtectedBody({request, session})
        const body = validateBodyFields({fields, schema: ServerIssueRequestSchema})
        const templateSet = findTemplateSet(this.context.config.profiles.templateSets, body.template_set)

        const issued = await this.context.services.certificates.issue({
          type: 'server',
          commonName: body.common_name,
          principal,
          actor: session.subject
        })
        sendJson({
          response,
          status: 201,
          correlationId,
          payload: buildServerBundle({
            templateSet,
            commonName: body.common_name,
            issued,
            tlsCryptKey: this.context.config.profiles.tlsCryptKey
          })
        })
      }
    })
  }

  @Get('/admin/certificates/:fingerprint')
  public async detail(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      handler: async ({correlationId}) => {
        const {principal} = await this.context.requireSession({request})
        assertAllowed(authorize(principal, 'certificate.search'))

        const certificate = await this.context.services.certificates.read({
          principal,
          fingerprint: request.params['fingerprint']
        })
        const entries = unwrapTransparency(
          await this.context.services.transparency.entries({fingerprint: certificate.fingerprint})
        )
        sendJson({response, status: 200, correlationId, payload: {certificate, entries}})
      }
    })
  }

  @Post('/admin/certificates/:fingerprint/revoke')
  public async revoke(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      handler: async ({correlationId}) => {
        const {session, principal} = await this.context.requireSession({request})
        assertAllowed(authorize(principal, 'certificate.search'))

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
