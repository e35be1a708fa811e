import {webcrypto} from 'node:crypto'
import {promises as fs} from 'node:fs'
import {tmpdir} from 'node:os'
import path from 'node:path'

import type {FetchLike} from '@ovpn-portal/auth'
import * as x509 from '@peculiar/x509'
import {afterEach, describe, expect, it} from 'vitest'

import {createCertificateAuthority, signWithVault, type SignCertificateInput} from '../certificateIssuer'
import type {VaultCertificateIssuerConfig} from '../config'
import {isAppError} from '../errors'

const SIGNING = {name: 'ECDSA', hash: 'SHA-256'} as const

const createCsr = async (commonName: string) => {
  const keys = await webcrypto.subtle.generateKey({name: 'ECDSA', namedCurve: 'P-256'}, true, ['sign', 'verify'])
  const csr = await x509.Pkcs10CertificateRequestGenerator.create({
    name: `CN=${commonName}`,
    keys,
    signingAlgorithm: SIGNING
  })
  return csr.toString('pem')
}

const signInput = async (overrides: Partial<SignCertificateInput> = {}): Promise<SignCertificateInput> => ({
  csrPem: await createCsr('gw-1.example.org'),
  type: 'server',
  commonName: 'gw-1.example.org',
  ttlSeconds: 3_600,
  ...overrides
})

const vaultConfig: VaultCertificateIssuerConfig = {
  mode: 'vault',
  caChainPem: '-----BEGIN CERTIFICATE-----\nconfigured\n-----END CERTIFICATE-----',
  vaultAddr: 'https://vault.example.test',
  vaultToken: 'test-secret',
  vaultPkiMount: 'pki_int',
  vaultPkiRole: 'openvpn',
  vaultRequestTimeoutMs: 50
}

const rejectionOf = async (promise: Promise<unknown>) => promise.then(() => null, (error: unknown) => error)

const tempDirs: string[] = []

afterEach(async () => {
  await Promise.all(tempDirs.splice(0).map(dir => fs.rm(dir, {recursive: true, force: true})))
})

describe('mock certificate authority', () => {
  it('signs a server certificate with serverAuth and a DNS name', async () => {
    const authority = createCertificateAuthority({config: {mode: 'mock'}})

    const signed = await authority.sign(await signInput())
    const certificate = new x509.X509Certificate(signed.certificatePem)

    expect(certificate.subject).toBe('CN=gw-1.example.org')
    expect(certificate.issuer).toBe('CN=OpenVPN Portal Development Intermediate CA')
    expect(certificate.getExtension(x509.ExtendedKeyUsageExtension)?.usages).toEqual(['1.3.6.1.5.5.7.3.1'])
    expect(certificate.getExtension(x509.SubjectAlternativeNameExtension)?.names.items[0]?.value).toBe(
      'gw-1.example.org'
    )
    expect(signed.caChainPem).toBe(await authority.caChainPem())
  })

  it('marks client certificates for clientAuth only', async () => {
    const authority = createCertificateAuthority({config: {mode: 'mock'}})

    const signed = await authority.sign(
      await signInput({csrPem: await createCsr('alice'), type: 'client', commonName: 'alice'})
    )
    const certificate = new x509.X509Certificate(signed.certificatePem)

    expect(certificate.getExtension(x509.ExtendedKeyUsageExtension)?.usages).toEqual(['1.3.6.1.5.5.7.3.2'])
    expect(certificate.getExtension(x509.SubjectAlternativeNameExtension)).toBeNull()
  })

  it('refuses a CSR it cannot parse', async () => {
    const authority = createCertificateAuthority({config: {mode: 'mock'}})

    const error = await rejectionOf(authority.sign(await signInput({csrPem: 'not a csr'})))

    expect(isAppError(error) ? [error.status, error.code] : null).toEqual([503, 'csr_parse_failed'])
  })
})

describe('local certificate authority', () => {
  const writeCa = async () => {
    const dir = await fs.mkdtemp(path.join(tmpdir(), 'portal-ca-'))
    tempDirs.push(dir)
    const keys = await webcrypto.subtle.generateKey({name: 'ECDSA', namedCurve: 'P-256'}, true, ['sign', 'verify'])
    const caCert = await x509.X509CertificateGenerator.createSelfSigned({
      serialNumber: '01',
      name: 'CN=Local Test CA',
      notBefore: new Date('2026-01-01T00:00:00.000Z'),
      notAfter: new Date('2036-01-01T00:00:00.000Z'),
      signingAlgorithm: SIGNING,
      keys,
      extensions: [new x509.BasicConstraintsExtension(true, 0, true)]
    })
    const certPem = caCert.toString('pem')
    const keyPem = x509.PemConverter.encode(await webcrypto.subtle.exportKey('pkcs8', keys.privateKey), 'PRIVATE KEY')

    const caCertPath = path.join(dir, 'ca.crt')
    const caKeyPath = path.join(dir, 'ca.key')
    await Promise.all([fs.writeFile(caCertPath, certPem), fs.writeFile(caKeyPath, keyPem)])
    return {caCertPath, caKeyPath, certPem}
  }

  it('signs with the CA read from disk', async () => {
    const {caCertPath, caKeyPath, certPem} = await writeCa()
    const authority = createCertificateAuthority({
      config: {mode: 'local', caCertPath, caKeyPath, caChainPem: certPem}
    })

    const signed = await authority.sign(await signInput())

    expect(new x509.X509Certificate(signed.certificatePem).issuer).toBe('CN=Local Test CA')
    expect(signed.caChainPem).toBe(certPem)
  })

  it('reports missing CA files as unavailable', async () => {
    const authority = createCertificateAuthority({
      config: {
        mode: 'local',
        caCertPath: path.join(tmpdir(), 'portal-ca-missing', 'ca.crt'),
        caKeyPath: path.join(tmpdir(), 'portal-ca-missing', 'ca.key'),
        caChainPem: 'unused'
      }
    })

    const error = await rejectionOf(authority.sign(await signInput()))

    expect(isAppError(error) ? [error.status, error.code] : null).toEqual([503, 'local_ca_unavailable'])
  })
})

describe('signWithVault', () => {
  it('posts the CSR to the role endpoint and returns the issuing chain', async () => {
    const requests: {url: string; init: RequestInit | undefined}[] = []
    const fetchImpl: FetchLike = async (url, init) => {
      requests.push({url, init})
      return new Response(
        JSON.stringify({data: {certificate: 'leaf-pem', issuing_ca: 'issuer-pem', serial_number: '01'}}),
        {status: 200, headers: {'content-type': 'application/json'}}
      )
    }
    const input = await signInput()

    const signed = await signWithVault({config: vaultConfig, input, fetchImpl})

    expect(signed).toEqual({certificatePem: 'leaf-pem', caChainPem: 'issuer-pem'})
    expect(requests[0]?.url).toBe('https://vault.example.test/v1/pki_int/sign/openvpn')
    expect(requests[0]?.init?.method).toBe('POST')
    expect(JSON.parse(String(requests[0]?.init?.body))).toEqual({
      csr: input.csrPem,
      common_name: 'gw-1.example.org',
      ttl: '3600s'
    })
  })

  it('falls back to the configured chain', async () => {
    const fetchImpl: FetchLike = async () => new Response(JSON.stringify({data: {certificate: 'leaf-pem'}}))

    const signed = await signWithVault({config: vaultConfig, input: await signInput(), fetchImpl})

    expect(signed.caChainPem).toBe(vaultConfig.caChainPem)
  })

  it('maps a refused request to upstream_rejected', async () => {
    const fetchImpl: FetchLike = async () => new Response('permission denied', {status: 403})

    const error = await rejectionOf(signWithVault({config: vaultConfig, input: await signInput(), fetchImpl}))

    expect(isAppError(error) ? [error.status, error.code] : null).toEqual([502, 'upstream_rejected'])
  })

  it('times out a stalled request without retrying', async () => {
    let calls = 0
    const fetchImpl: FetchLike = (_url, init) => {
      calls += 1
      const signal = init?.signal
      return new Promise<Response>((_resolve, reject) => {
        signal?.addEventListener('abort', () => {
          reject(signal.reason)
        })
      })
    }

    const error = await rejectionOf(signWithVault({config: vaultConfig, input: await signInput(), fetchImpl}))

    expect(isAppError(error) ? [error.status, error.code, error.headers['retry-after']] : null).toEqual([
      504,
      'upstream_timeout',
      '5'
    ])
    expect(calls).toBe(1)
  })
})
