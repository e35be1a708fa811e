export const PORTAL_CONFIG = Symbol('PORTAL_CONFIG')
export const PORTAL_LOGGER = Symbol('PORTAL_LOGGER')
export const PORTAL_SERVICES = Symbol('PORTAL_SERVICES')
