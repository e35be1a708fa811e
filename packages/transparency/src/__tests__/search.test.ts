import {describe, expect, it} from 'vitest'

import {echoFilters, escapeHtml, normalizeCertificateQuery, toCertificateSearchFilter} from '../index'

describe('normalizeCertificateQuery', () => {
  it('applies defaults for an empty query', () => {
    expect(normalizeCertificateQuery({})).toEqual({include_revoked: false, page: 1, limit: 25})
  })

  it('keeps valid filters', () => {
    expect(
      normalizeCertificateQuery({
        type: 'Server',
        subject: '  vpn-gw  ',
        from_date: '2026-01-01',
        to_date: '2026-01-31',
        include_revoked: 'on',
        page: '3',
        limit: '50'
      })
    ).toEqual({
      type: 'server',
      subject: 'vpn-gw',
      from_date: '2026-01-01',
      to_date: '2026-01-31',
      include_revoked: true,
      page: 3,
      limit: 50
    })
  })

  it('ignores unknown types, blank subjects and impossible dates', () => {
    expect(
      normalizeCertificateQuery({type: 'ca', subject: '   ', from_date: '2026-02-30', to_date: 'yesterday'})
    ).toEqual({include_revoked: false, page: 1, limit: 25})
  })

  it('swaps a reversed date range', () => {
    expect(normalizeCertificateQuery({from_date: '2026-03-01', to_date: '2026-01-01'})).toMatchObject({
      from_date: '2026-01-01',
      to_date: '2026-03-01'
    })
  })

  it.each([
    [{page: 'abc'}, 1, 25],
    [{page: '0', limit: '0'}, 1, 25],
    [{page: '-4', limit: '-1'}, 1, 25],
    [{page: '999999', limit: '1000'}, 10_000, 100],
    [{page: '2.5', limit: '10'}, 1, 10]
  ])('clamps pagination for %o', (raw, page, limit) => {
    expect(normalizeCertificateQuery(raw)).toMatchObject({page, limit})
  })

  it('truncates long subjects and reads the first of repeated parameters', () => {
    const query = normalizeCertificateQuery({subject: 'x'.repeat(300), include_revoked: ['yes', 'no']})

    expect(query.subject).toHaveLength(128)
    expect(query.include_revoked).toBe(true)
  })
})

describe('toCertificateSearchFilter', () => {
  it('makes the upper date bound inclusive of the whole day', () => {
    const filter = toCertificateSearchFilter(
      normalizeCertificateQuery({from_date: '2026-01-01', to_date: '2026-01-31', type: 'client'}),
      {ownerSubject: 'user-123'}
    )

    expect(filter).toEqual({
      type: 'client',
      ownerSubject: 'user-123',
      issuedFrom: new Date('2026-01-01T00:00:00.000Z'),
      issuedBefore: new Date('2026-02-01T00:00:00.000Z'),
      includeRevoked: false,
      page: 1,
      limit: 25
    })
  })
})

describe('escapeHtml', () => {
  it('escapes markup in the echoed subject', () => {
    expect(escapeHtml(`<script>alert("x")</script>&'`)).toBe(
      '&lt;script&gt;alert(&quot;x&quot;)&lt;/script&gt;&amp;&#x27;'
    )
    expect(echoFilters(normalizeCertificateQuery({subject: '<b>'}))).toEqual({
      type: null,
      subject_html: '&lt;b&gt;',
      from_date: null,
      to_date: null,
      include_revoked: false
    })
  })
})
