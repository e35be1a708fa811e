import {Controller, Get, Inject, Req, Res} from '@nestjs/common'
import type {Request, Response} from 'express'

import {assertAllowed, authorize} from '../../accessControl'
import {toCommonName} from '../../certificateService'
import {sendAttachment, sendJson} from '../../http'
import {buildServerBundle, findTemplateSet, profileFilename, renderClientProfile} from '../../profiles'
import {PortalControllerContext} from '../controllerContext'

// Machine endpoints authenticate with `Authorization: Bearer <psk>` only; cookies are ignored.
@Controller()
export class MachineApiController {
  public constructor(@Inject(PortalControllerContext) private readonly context: PortalControllerContext) {}

  @Get('/api/v1/server/bundle')
  public async serverBundle(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      handler: async ({correlationId}) => {
        const principal = await this.context.authenticatePsk({request, expectedType: 'server'})
        assertAllowed(authorize(principal, 'bundle.server'))

        const templateSet = findTemplateSet(this.context.config.profiles.templateSets, principal.templateSet)
        const commonName = toCommonName(principal.description)
        const issued = await this.context.services.certificates.issue({
          type: 'server',
          commonName,
          principal,
          actor: `psk:${principal.pskId}`
        })

        sendJson({
          response,
          status: 200,
          correlationId,
          payload: buildServerBundle({
            templateSet,
            commonName,
            issued,
            tlsCryptKey: this.context.config.profiles.tlsCryptKey
          })
        })
      }
    })
  }

  @Get('/api/v1/computer/profile')
  public async computerProfile(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      handler: async ({correlationId}) => {
        const principal = await this.context.authenticatePsk({request, expectedType: 'computer'})
        assertAllowed(authorize(principal, 'profile.computer'))

        const templateSet = findTemplateSet(this.context.config.profiles.templateSets, principal.templateSet)
        const commonName = toCommonName(principal.description)
        const issued = await this.context.services.certificates.issue({
          type: 'computer',
          commonName,
          principal,
          actor: `psk:${principal.pskId}`
        })

        sendAttachment({
          response,
          correlationId,
          filename: profileFilename(commonName),
          contentType: 'application/x-openvpn-profile',
          content: renderClientProfile({
            templateSet,
            issued,
            tlsCryptKey: this.context.config.profiles.tlsCryptKey
          })
        })
      }
    })
  }
}
