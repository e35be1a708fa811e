import {Controller, Get, Inject, Req, Res} from '@nestjs/common'
import type {Request, Response} from 'express'
import {deriveCsrfToken} from '@ovpn-portal/auth'
import {SessionResponseSchema} from '@ovpn-portal/schemas'

import {fromAuthFlowError} from '../../errors'
import {sendJson, sendRedirect} from '../../http'
import {PortalControllerContext} from '../controllerContext'

const queryValue = (url: URL, name: string) => url.searchParams.get(name) ?? undefined

@Controller()
export class AuthController {
  public constructor(@Inject(PortalControllerContext) private readonly context: PortalControllerContext) {}

  @Get('/auth/login')
  public async login(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      handler: async ({correlationId, url}) => {
        const login = await this.context.services.relyingParty.beginLogin({
          redirectTarget: url.searchParams.get('next')
        })

        this.context.log.info({
          event: 'auth.login.started',
          component: 'auth.oidc',
          message: 'Redirecting to identity provider'
        })
        sendRedirect({response, location: login.authorizationUrl, correlationId})
      }
    })
  }

  @Get('/auth/callback')
  public async callback(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      handler: async ({correlationId, url}) => {
        const outcome = await this.context.services.relyingParty.completeLogin({
          state: queryValue(url, 'state'),
          code: queryValue(url, 'code'),
          error: queryValue(url, 'error'),
          errorDescription: queryValue(url, 'error_description')
        })

        if (outcome.state === 'auth_failed') {
          throw fromAuthFlowError(outcome.reason)
        }

        // A fresh token on every login; any earlier session for this browser is dropped.
        await this.context.services.sessions.destroy(this.context.readSessionToken(request))
        const {token, session} = await this.context.services.sessions.create({
          identity: outcome.identity,
          idToken: outcome.idToken
        })

        this.context.log.info({
          event: 'auth.session.created',
          component: 'auth.session',
          message: 'Session established',
          subject: session.subject,
          metadata: {roles: session.roles}
        })
        sendRedirect({
          response,
          location: outcome.redirectTarget,
          correlationId,
          headers: {'set-cookie': this.context.sessionCookie(token)}
        })
      }
    })
  }

  @Get('/auth/logout')
  public async logout(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      handler: async ({correlationId}) => {
        const {token, session} = await this.context.optionalSession({request})
        const logoutUrl = session
          ? await this.context.services.relyingParty.buildLogoutUrl({
              idTokenHint: session.idToken,
              postLogoutRedirectUri: this.context.config.oidc.postLogoutRedirectUri
            })
          : null

        if (session && logoutUrl) {
          await this.context.services.sessions.markLogoutPending(session)
          this.context.log.info({
            event: 'auth.logout.started',
            component: 'auth.oidc',
            message: 'Redirecting to identity provider logout',
            subject: session.subject
          })
          sendRedirect({response, location: logoutUrl, correlationId})
          return
        }

        await this.context.services.sessions.destroy(token)
        this.context.log.info({
          event: 'auth.logout.completed',
          component: 'auth.oidc',
          message: 'Local session ended',
          metadata: {provider_logout: false}
        })
        sendRedirect({
          response,
          location: '/',
          correlationId,
          headers: {'set-cookie': this.context.clearSessionCookie()}
        })
      }
    })
  }

  @Get('/auth/logout/complete')
  public async logoutComplete(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      handler: async ({correlationId}) => {
        await this.context.services.sessions.destroy(this.context.readSessionToken(request))
        this.context.log.info({
          event: 'auth.logout.completed',
          component: 'auth.oidc',
          message: 'Session ended after provider logout',
          metadata: {provider_logout: true}
        })
        sendRedirect({
          response,
          location: '/',
          correlationId,
          headers: {'set-cookie': this.context.clearSessionCookie()}
        })
      }
    })
  }

  @Get('/auth/session')
  public async session(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      handler: async ({correlationId}) => {
        const {session} = await this.context.requireSession({request})
        sendJson({
          response,
          status: 200,
          correlationId,
          payload: SessionResponseSchema.parse({
            subject: session.subject,
            display_name: session.displayName,
            roles: session.roles,
            issued_at: session.issuedAt,
            expires_at: session.expiresAt,
            csrf_token: deriveCsrfToken(session)
          })
        })
      }
    })
  }
}
