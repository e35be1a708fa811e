import {DynamicModule, Module} from '@nestjs/common'
import type {StructuredLogger} from '@ovpn-portal/logging'

import type {ServiceConfig} from '../config'
import type {PortalServices} from '../services'
import {PortalControllerContext} from './controllerContext'
import {AdminCertificatesController} from './controllers/adminCertificatesController'
import {AdminPskController} from './controllers/adminPskController'
import {AuthController} from './controllers/authController'
import {FallbackController} from './controllers/fallbackController'
import {HealthController} from './controllers/healthController'
import {MachineApiController} from './controllers/machineApiController'
import {ProfileController} from './controllers/profileController'
import {PublicCertificatesController} from './controllers/publicCertificatesController'
import {PORTAL_CONFIG, PORTAL_LOGGER, PORTAL_SERVICES} from './tokens'

export type PortalNestModuleOptions = {
  config: ServiceConfig
  services: PortalServices
  logger: StructuredLogger
}

@Module({
  // FallbackController last: its catch-all would otherwise shadow every route.
  controllers: [
    HealthController,
    AuthController,
    ProfileController,
    AdminPskController,
    AdminCertificatesController,
    PublicCertificatesController,
    MachineApiController,
    FallbackController
  ]
})
export class PortalNestModule {
  public static register(options: PortalNestModuleOptions): DynamicModule {
    return {
      module: PortalNestModule,
      providers: [
        {
          provide: PORTAL_CONFIG,
          useValue: options.config
        },
        {
          provide: PORTAL_SERVICES,
          useValue: options.services
        },
        {
          provide: PORTAL_LOGGER,
          useValue: options.logger
        },
        PortalControllerContext
      ]
    }
  }
}
