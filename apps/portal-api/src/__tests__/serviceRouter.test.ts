import {describe, expect, it} from 'vitest'

import {classifyRoute, decideRoute} from '../serviceRouter'

const counterparts = {
  userServiceUrl: 'https://vpn.example.test',
  adminServiceUrl: 'https://vpn-admin.example.test'
}

describe('classifyRoute', () => {
  it('splits paths by whole segment', () => {
    expect(classifyRoute('/profile')).toBe('user')
    expect(classifyRoute('/profile/certificates/abc')).toBe('user')
    expect(classifyRoute('/profiles')).toBe('shared')
    expect(classifyRoute('/admin/psk')).toBe('admin')
    expect(classifyRoute('/certificates')).toBe('admin')
    expect(classifyRoute('/api/v1/server/bundle')).toBe('admin')
    expect(classifyRoute('/auth/login')).toBe('shared')
    expect(classifyRoute('/health')).toBe('shared')
  })

  it('ignores letter case the way route matching does', () => {
    expect(classifyRoute('/PROFILE')).toBe('user')
    expect(classifyRoute('/Profile/Certificates')).toBe('user')
    expect(classifyRoute('/Admin/psk')).toBe('admin')
    expect(classifyRoute('/API/v1/server/bundle')).toBe('admin')
    expect(classifyRoute('/Certificates/')).toBe('admin')
  })
})

describe('decideRoute', () => {
  it('serves everything in combined mode', () => {
    expect(
      decideRoute({mode: 'combined', scope: 'admin', method: 'POST', path: '/admin/psk', query: '', counterparts: {}})
    ).toEqual({action: 'serve'})
  })

  it('serves shared routes in every mode', () => {
    expect(
      decideRoute({mode: 'user', scope: 'shared', method: 'GET', path: '/auth/login', query: '', counterparts})
    ).toEqual({action: 'serve'})
  })

  it('redirects admin pages from the user service with the query kept', () => {
    expect(
      decideRoute({
        mode: 'user',
        scope: 'admin',
        method: 'GET',
        path: '/certificates',
        query: '?q=gw&page=2',
        counterparts
      })
    ).toEqual({action: 'redirect', status: 301, location: 'https://vpn-admin.example.test/certificates?q=gw&page=2'})
  })

  it('redirects user pages from the admin service', () => {
    expect(
      decideRoute({mode: 'admin', scope: 'user', method: 'HEAD', path: '/profile', query: '', counterparts})
    ).toEqual({action: 'redirect', status: 301, location: 'https://vpn.example.test/profile'})
  })

  it('never redirects the machine API away from the user service', () => {
    expect(
      decideRoute({
        mode: 'user',
        scope: 'admin',
        method: 'GET',
        path: '/api/v1/server/bundle',
        query: '',
        counterparts
      })
    ).toEqual({action: 'unavailable'})
  })

  it('keeps the machine API unavailable whatever its letter case', () => {
    expect(
      decideRoute({mode: 'user', scope: 'admin', method: 'GET', path: '/API/v1/server/bundle', query: '', counterparts})
    ).toEqual({action: 'unavailable'})
  })

  it('refuses to redirect requests that carry a body', () => {
    expect(
      decideRoute({mode: 'admin', scope: 'user', method: 'post', path: '/profile', query: '', counterparts})
    ).toEqual({action: 'unavailable'})
  })

  it('is unavailable when no counterpart is configured', () => {
    expect(
      decideRoute({mode: 'admin', scope: 'user', method: 'GET', path: '/profile', query: '', counterparts: {}})
    ).toEqual({action: 'unavailable'})
  })
})
