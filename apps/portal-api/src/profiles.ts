import type {ServerBundle} from '@ovpn-portal/schemas'
import {ServerBundleSchema} from '@ovpn-portal/schemas'

import type {TemplateGroupMapping, TemplateSet} from './config'
import type {IssuedCertificate} from './certificateService'
import {badRequest} from './errors'

export type ProfileOptions = {
  useTcp: boolean
  customPort?: number
}

const DEFAULT_TEMPLATE_SET = 'default'
const SERVER_SUBNET = '10.8.0.0 255.255.255.0'

export const findTemplateSet = (templateSets: TemplateSet[], name: string): TemplateSet => {
  const templateSet = templateSets.find(candidate => candidate.name === name)
  if (!templateSet) {
    throw badRequest('template_set_unknown', 'Template set is not configured')
  }

  return templateSet
}

/** First mapping whose groups intersect the user's groups wins; otherwise `default`. */
export const selectTemplateSetName = ({
  groups,
  mappings
}: {
  groups: readonly string[]
  mappings: readonly TemplateGroupMapping[]
}) => {
  const userGroups = new Set(groups)
  const match = mappings.find(mapping => mapping.groups.some(group => userGroups.has(group)))
  return match?.templateSet ?? DEFAULT_TEMPLATE_SET
}

const resolveTransport = (templateSet: TemplateSet, options: ProfileOptions) => ({
  protocol: options.useTcp ? 'tcp' : templateSet.protocol,
  port: options.customPort ?? templateSet.port
})

const inlineBlock = (tag: string, content: string) => [`<${tag}>`, content.trim(), `</${tag}>`]

export const renderClientProfile = ({
  templateSet,
  issued,
  tlsCryptKey,
  options = {useTcp: false}
}: {
  templateSet: TemplateSet
  issued: Pick<IssuedCertificate, 'certificatePem' | 'privateKeyPem' | 'caChainPem'>
  tlsCryptKey?: string
  options?: ProfileOptions
}) => {
  const {protocol, port} = resolveTransport(templateSet, options)

  const lines = [
    'client',
    'dev tun',
    `proto ${protocol === 'tcp' ? 'tcp-client' : 'udp'}`,
    `remote ${templateSet.remote_host} ${port}`,
    'resolv-retry infinite',
    'nobind',
    'persist-key',
    'persist-tun',
    'remote-cert-tls server',
    `cipher ${templateSet.cipher}`,
    'verb 3',
    ...inlineBlock('ca', issued.caChainPem),
    ...inlineBlock('cert', issued.certificatePem),
    ...inlineBlock('key', issued.privateKeyPem),
    ...(tlsCryptKey ? inlineBlock('tls-crypt', tlsCryptKey) : [])
  ]

  return `${lines.join('\n')}\n`
}

export const renderServerConfig = ({templateSet, tlsCrypt}: {templateSet: TemplateSet; tlsCrypt: boolean}) => {
  const lines = [
    `port ${templateSet.port}`,
    `proto ${templateSet.protocol === 'tcp' ? 'tcp-server' : 'udp'}`,
    'dev tun',
    'ca ca.crt',
    'cert server.crt',
    'key server.key',
    'dh none',
    `server ${SERVER_SUBNET}`,
    'keepalive 10 120',
    `cipher ${templateSet.cipher}`,
    'persist-key',
    'persist-tun',
    'verb 3',
    ...(tlsCrypt ? ['tls-crypt ta.key'] : [])
  ]

  return `${lines.join('\n')}\n`
}

export const buildServerBundle = ({
  templateSet,
  commonName,
  issued,
  tlsCryptKey
}: {
  templateSet: TemplateSet
  commonName: string
  issued: IssuedCertificate
  tlsCryptKey?: string
}): ServerBundle =>
  ServerBundleSchema.parse({
    bundle_type: 'server',
    fingerprint: issued.certificate.fingerprint,
    common_name: commonName,
    files: [
      {name: 'ca.crt', content: issued.caChainPem},
      {name: 'server.crt', content: issued.certificatePem},
      {name: 'server.key', content: issued.privateKeyPem},
      {name: 'server.conf', content: renderServerConfig({templateSet, tlsCrypt: Boolean(tlsCryptKey)})},
      ...(tlsCryptKey ? [{name: 'ta.key', content: tlsCryptKey}] : [])
    ]
  })

export const profileFilename = (commonName: string) => `${commonName.replace(/[^A-Za-z0-9._-]/gu, '_')}.ovpn`
