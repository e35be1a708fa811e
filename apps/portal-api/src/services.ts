import {OidcRelyingParty, SessionManager, type FetchLike, type OidcFlowTransition} from '@ovpn-portal/auth'
import type {StructuredLogger} from '@ovpn-portal/logging'
import {TransparencyLog} from '@ovpn-portal/transparency'

import {createCertificateAuthority, type CertificateAuthority} from './certificateIssuer'
import {CertificateService} from './certificateService'
import type {ServiceConfig} from './config'
import type {ProcessInfrastructure} from './infrastructure'
import {PskService} from './pskService'
import {SubmissionGuard} from './submissionGuard'

export type PortalServices = {
  sessions: SessionManager
  relyingParty: OidcRelyingParty
  certificates: CertificateService
  psks: PskService
  transparency: TransparencyLog
  authority: CertificateAuthority
  guard: SubmissionGuard
}

const logTransition = (logger: StructuredLogger) => (transition: OidcFlowTransition) => {
  if (transition.to === 'auth_failed') {
    logger.warn({
      event: 'auth.login.failed',
      component: 'auth.oidc',
      message: 'OIDC login failed',
      ...(transition.reason ? {reason_code: transition.reason} : {}),
      metadata: {from: transition.from, to: transition.to}
    })
    return
  }

  logger.info({
    event: transition.to === 'authenticated' ? 'auth.login.completed' : 'auth.login.transition',
    component: 'auth.oidc',
    message: `OIDC flow ${transition.from} -> ${transition.to}`,
    metadata: {from: transition.from, to: transition.to}
  })
}

export const createPortalServices = ({
  config,
  infrastructure,
  logger,
  fetchImpl,
  authority,
  now
}: {
  config: ServiceConfig
  infrastructure: ProcessInfrastructure
  logger: StructuredLogger
  fetchImpl?: FetchLike
  authority?: CertificateAuthority
  now?: () => Date
}): PortalServices => {
  const guard = new SubmissionGuard({enabled: config.duplicateSubmissionGuard})
  const resolvedAuthority =
    authority ??
    createCertificateAuthority({config: config.certificateIssuer, ...(fetchImpl ? {fetchImpl} : {})})

  return {
    sessions: new SessionManager({
      store: infrastructure.sessionStore,
      ttlSeconds: config.session.ttlSeconds,
      ...(now ? {now} : {})
    }),
    relyingParty: new OidcRelyingParty({
      issuer: config.oidc.issuer,
      clientId: config.oidc.clientId,
      ...(config.oidc.clientSecret ? {clientSecret: config.oidc.clientSecret} : {}),
      redirectUri: config.oidc.redirectUri,
      scope: config.oidc.scope,
      groupsClaim: config.oidc.groupsClaim,
      adminGroup: config.oidc.adminGroup,
      exchangeTtlSeconds: config.oidc.exchangeTtlSeconds,
      httpTimeoutMs: config.oidc.httpTimeoutMs,
      exchangeStore: infrastructure.exchangeStore,
      endpointOverrides: config.oidc.endpointOverrides,
      onTransition: logTransition(logger),
      ...(fetchImpl ? {fetch: fetchImpl} : {}),
      ...(now ? {now} : {})
    }),
    certificates: new CertificateService({
      repository: infrastructure.certificateRepository,
      authority: resolvedAuthority,
      guard,
      logger,
      ttlSeconds: config.certificateTtlSeconds,
      ...(now ? {now} : {})
    }),
    psks: new PskService({
      repository: infrastructure.pskRepository,
      logger,
      templateSetNames: config.profiles.templateSets.map(templateSet => templateSet.name),
      ...(now ? {now} : {})
    }),
    transparency: new TransparencyLog({repository: infrastructure.certificateRepository}),
    authority: resolvedAuthority,
    guard
  }
}
