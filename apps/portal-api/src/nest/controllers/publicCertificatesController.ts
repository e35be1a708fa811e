import {Controller, Get, Inject, Req, Res} from '@nestjs/common'
import type {Request, Response} from 'express'
import {normalizeCertificateQuery} from '@ovpn-portal/transparency'

import {sendJson} from '../../http'
import {PortalControllerContext, unwrapTransparency} from '../controllerContext'

@Controller()
export class PublicCertificatesController {
  public constructor(@Inject(PortalControllerContext) private readonly context: PortalControllerContext) {}

  // Anonymous transparency view; owner subjects are never part of it.
  @Get('/certificates')
  public async list(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      handler: async ({correlationId, url}) => {
        const listing = unwrapTransparency(
          await this.context.services.transparency.list({
            query: normalizeCertificateQuery(Object.fromEntries(url.searchParams.entries())),
            view: 'public'
          })
        )
        sendJson({response, status: 200, correlationId, payload: listing})
      }
    })
  }
}
