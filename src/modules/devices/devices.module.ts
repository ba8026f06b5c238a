import { Module } from '@nestjs/common';

import { UsersModule } from '../users/users.module';
import { DeviceRegistrationService } from './application/device-registration.service';
import { DeviceController } from './infrastructure/controllers/device.controller';

/**
 * Módulo de dispositivos.
 *
 * El registro vive inline en el usuario, por eso no declara schemas propios.
 *
 * Endpoints:
 * - GET /device
 * - POST /device
 * - DELETE /device
 */
@Module({
  imports: [UsersModule],
  controllers: [DeviceController],
  providers: [DeviceRegistrationService],
  exports: [DeviceRegistrationService],
})
export class DevicesModule {}
