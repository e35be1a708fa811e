import {Controller, Get, Inject, Post, Req, Res} from '@nestjs/common'
import type {Request, Response} from 'express'
import {PskCreateRequestSchema, PskCreateResponseSchema} from '@ovpn-portal/schemas'
import {z} from 'zod'

import {assertAllowed, authorize} from '../../accessControl'
import {notFound} from '../../errors'
import {sendJson, validateBodyFields} from '../../http'
import {PortalControllerContext} from '../controllerContext'

const PskIdSchema = z.string().uuid()

@Controller()
export class AdminPskController {
  public constructor(@Inject(PortalControllerContext) private readonly context: PortalControllerContext) {}

  @Get('/admin/psk')
  public async list(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      handler: async ({correlationId}) => {
        const {principal} = await this.context.requireSession({request})
        assertAllowed(authorize(principal, 'psk.list'))

        const psks = await this.context.services.psks.list()
        sendJson({response, status: 200, correlationId, payload: {psks}})
      }
    })
  }

  @Post(['/admin/psk', '/admin/psk/new'])
  public async create(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      handler: async ({correlationId}) => {
        const {session, principal} = await this.context.requireSession({request})
        assertAllowed(authorize(principal, 'psk.create'))

        const fields = await this.context.readProtectedBody({request, session})
        const body = validateBodyFields({fields, schema: PskCreateRequestSchema})
        const created = await this.context.services.psks.create({request: body, actor: session.subject})

        sendJson({
          response,
          status: 201,
          correlationId,
          payload: PskCreateResponseSchema.parse(created)
        })
      }
    })
  }

  @Post('/admin/psk/:pskId/revoke')
  public async revoke(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      handler: async ({correlationId}) => {
        const {session, principal} = await this.context.requireSession({request})
        assertAllowed(authorize(principal, 'psk.revoke'))
        await this.context.readProtectedBody({request, session})

        const pskId = PskIdSchema.safeParse(request.params['pskId'])
        if (!pskId.success) {
          throw notFound('psk_not_found', 'Pre-shared key not found')
        }

        const psk = await this.context.services.psks.revoke({pskId: pskId.data, actor: session.subject})
        sendJson({response, status: 200, correlationId, payload: {psk}})
      }
    })
  }
}
