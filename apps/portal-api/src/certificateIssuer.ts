import {createPrivateKey, createPublicKey, randomBytes, timingSafeEqual, webcrypto} from 'node:crypto'
import {promises as fs} from 'node:fs'

import type {FetchLike} from '@ovpn-portal/auth'
import type {CertificateType} from '@ovpn-portal/schemas'
import * as x509 from '@peculiar/x509'
import {z} from 'zod'

import type {CertificateIssuerConfig, LocalCertificateIssuerConfig, VaultCertificateIssuerConfig} from './config'
import {badGateway, gatewayTimeout, isAppError, serviceUnavailable} from './errors'

export type SignCertificateInput = {
  csrPem: string
  type: CertificateType
  commonName: string
  ttlSeconds: number
}

export type SignedCertificate = {
  certificatePem: string
  caChainPem: string
}

export type CertificateAuthority = {
  readonly mode: CertificateIssuerConfig['mode']
  sign: (input: SignCertificateInput) => Promise<SignedCertificate>
  caChainPem: () => Promise<string>
}

type SigningAlgorithm = {
  name: string
  hash?: 'SHA-256' | 'SHA-384' | 'SHA-512'
}

type SigningMaterial = {
  caCert: x509.X509Certificate
  signingKey: webcrypto.CryptoKey
  signingAlgorithm: SigningAlgorithm
  chainPem: string
}

const EKU_SERVER_AUTH = '1.3.6.1.5.5.7.3.1'
const EKU_CLIENT_AUTH = '1.3.6.1.5.5.7.3.2'
const DNS_NAME_PATTERN = /^(?=.{1,253}$)([a-z0-9]([a-z0-9-]{0,61}[a-z0-9])?)(\.[a-z0-9]([a-z0-9-]{0,61}[a-z0-9])?)*$/iu
const MOCK_CA_VALIDITY_DAYS = 3650
const EC_SIGNING: SigningAlgorithm = {name: 'ECDSA', hash: 'SHA-256'}

const addSeconds = (base: Date, seconds: number) => new Date(base.getTime() + seconds * 1000)

const toPem = (der: ArrayBuffer, label: string) => x509.PemConverter.encode(der, label)

const toErrorMessage = (error: unknown) => (error instanceof Error ? error.message : String(error))

const createSerialNumber = () => {
  const bytes = randomBytes(16)
  // Positive INTEGER: clear the sign bit.
  bytes[0] = (bytes[0] ?? 0) & 0x7f
  return bytes.toString('hex')
}

const buildEndEntityExtensions = ({type, commonName}: {type: CertificateType; commonName: string}) => {
  const extensions: x509.Extension[] = [
    new x509.BasicConstraintsExtension(false, undefined, true),
    new x509.KeyUsagesExtension(x509.KeyUsageFlags.digitalSignature | x509.KeyUsageFlags.keyAgreement, true),
    new x509.ExtendedKeyUsageExtension([type === 'server' ? EKU_SERVER_AUTH : EKU_CLIENT_AUTH], false)
  ]

  if (type === 'server' && DNS_NAME_PATTERN.test(commonName)) {
    extensions.push(new x509.SubjectAlternativeNameExtension([{type: 'dns', value: commonName}], false))
  }

  return extensions
}

const signWithMaterial = async ({
  material,
  input
}: {
  material: SigningMaterial
  input: SignCertificateInput
}): Promise<SignedCertificate> => {
  let csr: x509.Pkcs10CertificateRequest
  try {
    csr = new x509.Pkcs10CertificateRequest(input.csrPem)
  } catch (error) {
    throw serviceUnavailable('csr_parse_failed', `Failed to parse CSR: ${toErrorMessage(error)}`)
  }

  const notBefore = new Date()
  let certificate: x509.X509Certificate
  try {
    certificate = await x509.X509CertificateGenerator.create({
      serialNumber: createSerialNumber(),
      subject: csr.subject,
      issuer: material.caCert.subject,
      notBefore,
      notAfter: addSeconds(notBefore, input.ttlSeconds),
      signingAlgorithm: material.signingAlgorithm,
      publicKey: csr.publicKey,
      signingKey: material.signingKey,
      extensions: buildEndEntityExtensions({type: input.type, commonName: input.commonName})
    })
  } catch (error) {
    throw serviceUnavailable('cert_sign_failed', `Failed to sign certificate: ${toErrorMessage(error)}`)
  }

  return {
    certificatePem: toPem(certificate.rawData, 'CERTIFICATE'),
    caChainPem: material.chainPem
  }
}

const generateEcKeyPair = () =>
  webcrypto.subtle.generateKey({name: 'ECDSA', namedCurve: 'P-256'}, true, ['sign', 'verify'])

/** Throwaway root and intermediate, generated once per process. */
export const createMockSigningMaterial = async (): Promise<SigningMaterial> => {
  const notBefore = new Date()
  const notAfter = addSeconds(notBefore, MOCK_CA_VALIDITY_DAYS * 24 * 60 * 60)
  const [rootKeys, intermediateKeys] = await Promise.all([generateEcKeyPair(), generateEcKeyPair()])

  const root = await x509.X509CertificateGenerator.createSelfSigned({
    serialNumber: createSerialNumber(),
    name: 'CN=OpenVPN Portal Development Root CA',
    notBefore,
    notAfter,
    signingAlgorithm: EC_SIGNING,
    keys: rootKeys,
    extensions: [
      new x509.BasicConstraintsExtension(true, 1, true),
      new x509.KeyUsagesExtension(x509.KeyUsageFlags.keyCertSign | x509.KeyUsageFlags.cRLSign, true)
    ]
  })

  const intermediate = await x509.X509CertificateGenerator.create({
    serialNumber: createSerialNumber(),
    subject: 'CN=OpenVPN Portal Development Intermediate CA',
    issuer: root.subject,
    notBefore,
    notAfter,
    signingAlgorithm: EC_SIGNING,
    publicKey: intermediateKeys.publicKey,
    signingKey: rootKeys.privateKey,
    extensions: [
      new x509.BasicConstraintsExtension(true, 0, true),
      new x509.KeyUsagesExtension(x509.KeyUsageFlags.keyCertSign | x509.KeyUsageFlags.cRLSign, true)
    ]
  })

  return {
    caCert: intermediate,
    signingKey: intermediateKeys.privateKey,
    signingAlgorithm: EC_SIGNING,
    chainPem: [toPem(intermediate.rawData, 'CERTIFICATE'), toPem(root.rawData, 'CERTIFICATE')].join('\n')
  }
}

const getCurveHashAlgorithm = (namedCurve: string): 'SHA-256' | 'SHA-384' | 'SHA-512' => {
  switch (namedCurve) {
    case 'prime256v1':
    case 'P-256':
      return 'SHA-256'
    case 'secp384r1':
    case 'P-384':
      return 'SHA-384'
    case 'secp521r1':
    case 'P-521':
      return 'SHA-512'
    default:
      throw serviceUnavailable('local_ca_invalid', `Unsupported EC named curve for local signing: ${namedCurve}`)
  }
}

const toWebCryptoCurve = (namedCurve: string) => {
  switch (namedCurve) {
    case 'prime256v1':
      return 'P-256'
    case 'secp384r1':
      return 'P-384'
    case 'secp521r1':
      return 'P-521'
    default:
      return namedCurve
  }
}

const resolveLocalSigningAlgorithms = (keyObject: ReturnType<typeof createPrivateKey>) => {
  const keyType = keyObject.asymmetricKeyType
  if (keyType === 'rsa') {
    return {
      importAlgorithm: {name: 'RSASSA-PKCS1-v1_5', hash: 'SHA-256'},
      signingAlgorithm: {name: 'RSASSA-PKCS1-v1_5', hash: 'SHA-256'}
    } as const
  }

  if (keyType === 'ec') {
    const namedCurve = keyObject.asymmetricKeyDetails?.namedCurve
    if (!namedCurve) {
      throw serviceUnavailable('local_ca_invalid', 'EC private key is missing named curve metadata')
    }

    return {
      importAlgorithm: {name: 'ECDSA', namedCurve: toWebCryptoCurve(namedCurve)},
      signingAlgorithm: {name: 'ECDSA', hash: getCurveHashAlgorithm(namedCurve)}
    } as const
  }

  throw serviceUnavailable('local_ca_invalid', `Unsupported local CA key algorithm: ${String(keyType)}`)
}

export const loadLocalSigningMaterial = async (config: LocalCertificateIssuerConfig): Promise<SigningMaterial> => {
  let caCertPem: string
  let caKeyPem: string
  try {
    ;[caCertPem, caKeyPem] = await Promise.all([
      fs.readFile(config.caCertPath, 'utf8'),
      fs.readFile(config.caKeyPath, 'utf8')
    ])
  } catch (error) {
    throw serviceUnavailable('local_ca_unavailable', `Failed to load CA files: ${toErrorMessage(error)}`)
  }

  try {
    const caCert = new x509.X509Certificate(caCertPem)
    const keyObject = createPrivateKey(caKeyPem)
    const publicKeyDer = createPublicKey(keyObject).export({format: 'der', type: 'spki'})
    const certPublicKeyDer = Buffer.from(caCert.publicKey.rawData)
    if (publicKeyDer.length !== certPublicKeyDer.length || !timingSafeEqual(publicKeyDer, certPublicKeyDer)) {
      throw serviceUnavailable('local_ca_invalid', 'Local CA certificate and private key do not match')
    }

    const algorithms = resolveLocalSigningAlgorithms(keyObject)
    const signingKey = await webcrypto.subtle.importKey(
      'pkcs8',
      keyObject.export({format: 'der', type: 'pkcs8'}),
      algorithms.importAlgorithm,
      false,
      ['sign']
    )

    return {
      caCert,
      signingKey,
      signingAlgorithm: algorithms.signingAlgorithm,
      chainPem: config.caChainPem
    }
  } catch (error) {
    if (isAppError(error)) {
      throw error
    }

    throw serviceUnavailable('local_ca_invalid', `Failed to parse CA certificate or key: ${toErrorMessage(error)}`)
  }
}

const VaultSignResponseSchema = z
  .object({
    data: z
      .object({
        certificate: z.string().min(1),
        issuing_ca: z.string().min(1).optional(),
        ca_chain: z.array(z.string().min(1)).optional()
      })
      .loose()
  })
  .loose()

const isTimeoutError = (error: unknown) =>
  error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')

// Signing is never retried: a retry after an ambiguous failure could mint a second certificate.
export const signWithVault = async ({
  config,
  input,
  fetchImpl
}: {
  config: VaultCertificateIssuerConfig
  input: SignCertificateInput
  fetchImpl: FetchLike
}): Promise<SignedCertificate> => {
  const endpoint = `${config.vaultAddr}/v1/${encodeURIComponent(config.vaultPkiMount)}/sign/${encodeURIComponent(config.vaultPkiRole)}`

  let response: Response
  try {
    response = await fetchImpl(endpoint, {
      method: 'POST',
      headers: {
        'content-type': 'application/json',
        'x-vault-token': config.vaultToken
      },
      body: JSON.stringify({
        csr: input.csrPem,
        common_name: input.commonName,
        ttl: `${input.ttlSeconds}s`
      }),
      redirect: 'error',
      signal: AbortSignal.timeout(config.vaultRequestTimeoutMs)
    })
  } catch (error) {
    if (isTimeoutError(error)) {
      throw gatewayTimeout('upstream_timeout', `Certificate authority did not respond within ${config.vaultRequestTimeoutMs}ms`)
    }

    throw badGateway('upstream_rejected', 'Certificate authority request could not be completed')
  }

  if (!response.ok) {
    throw badGateway('upstream_rejected', `Certificate authority responded with status ${response.status}`)
  }

  let body: unknown
  try {
    body = await response.json()
  } catch {
    throw badGateway('upstream_rejected', 'Certificate authority response is not valid JSON')
  }

  const parsed = VaultSignResponseSchema.safeParse(body)
  if (!parsed.success) {
    throw badGateway('upstream_rejected', 'Certificate authority response does not contain a certificate')
  }

  const chain = parsed.data.data.ca_chain ?? (parsed.data.data.issuing_ca ? [parsed.data.data.issuing_ca] : [])
  return {
    certificatePem: parsed.data.data.certificate,
    caChainPem: chain.length > 0 ? chain.join('\n') : config.caChainPem
  }
}

export const createCertificateAuthority = ({
  config,
  fetchImpl = fetch
}: {
  config: CertificateIssuerConfig
  fetchImpl?: FetchLike
}): CertificateAuthority => {
  if (config.mode === 'vault') {
    return {
      mode: config.mode,
      sign: input => signWithVault({config, input, fetchImpl}),
      caChainPem: () => Promise.resolve(config.caChainPem)
    }
  }

  let material: Promise<SigningMaterial> | null = null
  const loadMaterial = (): Promise<SigningMaterial> => {
    if (material) {
      return material
    }

    const pending = config.mode === 'mock' ? createMockSigningMaterial() : loadLocalSigningMaterial(config)
    material = pending
    void pending.catch(() => {
      material = null
    })
    return pending
  }

  return {
    mode: config.mode,
    sign: async input => signWithMaterial({material: await loadMaterial(), input}),
    caChainPem: async () => (await loadMaterial()).chainPem
  }
}
