import {Controller, Get, Inject, Req, Res} from '@nestjs/common'
import type {Request, Response} from 'express'
import {HealthResponseSchema} from '@ovpn-portal/schemas'

import {sendJson} from '../../http'
import {PortalControllerContext} from '../controllerContext'

@Controller()
export class HealthController {
  public constructor(@Inject(PortalControllerContext) private readonly context: PortalControllerContext) {}

  @Get('/health')
  public async handle(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      handler: ({correlationId}) => {
        sendJson({
          response,
          status: 200,
          correlationId,
          payload: HealthResponseSchema.parse({
            status: 'healthy',
            service: this.context.config.service.name,
            mode: this.context.config.service.mode
          })
        })
      }
    })
  }

  @Get('/')
  public async index(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      handler: async ({correlationId}) => {
        const {session} = await this.context.optionalSession({request})
        sendJson({
          response,
          status: 200,
          correlationId,
          payload: {
            service: this.context.config.service.name,
            authenticated: session?.status === 'active',
            login: '/auth/login',
            profile: '/profile'
          }
        })
      }
    })
  }
}
