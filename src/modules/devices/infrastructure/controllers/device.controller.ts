import type { Response } from 'express';

import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Post,
  Res,
  UseGuards,
} from '@nestjs/common';
import {
  ApiBearerAuth,
  ApiBody,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiTags,
  ApiUnauthorizedResponse,
} from '@nestjs/swagger';

import { AsyncContextService } from '../../../../common/context/async-context.service';
import { JwtAuthGuard } from '../../../auth/guards/jwt-auth.guard';
import { DeviceRegistrationService } from '../../application/device-registration.service';
import { RegisterDeviceDto } from '../../dto';

/**
 * DeviceController: slot único de dispositivo del usuario autenticado.
 */
@ApiTags('Device')
@ApiBearerAuth('access-token')
@UseGuards(JwtAuthGuard)
@Controller('device')
export class DeviceController {
  constructor(
    private readonly deviceRegistrationService: DeviceRegistrationService,
    private readonly asyncContextService: AsyncContextService,
  ) {}

  @Get()
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Dispositivo registrado actualmente' })
  @ApiOkResponse({ description: 'Registro actual o null' })
  async get(@Res() res: Response): Promise<Response> {
    const userId = this.asyncContextService.requireActorId();
    const response = await this.deviceRegistrationService.getRegisteredDevice(userId);
    return res.status(response.statusCode).json(response);
  }

  /**
   * POST /device
   * Sobrescribe el dispositivo registrado, si lo había.
   */
  @Post()
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Registrar dispositivo',
    description:
      'Ocupa el único slot de la cuenta. Un dispositivo previo se reemplaza sin confirmación.',
  })
  @ApiBody({
    type: RegisterDeviceDto,
    examples: {
      example1: {
        summary: 'iPhone',
        value: { deviceId: 'ios-123', deviceName: 'Mi iPhone' },
      },
    },
  })
  @ApiOkResponse({ description: 'Dispositivo registrado exitosamente' })
  @ApiUnauthorizedResponse({ description: 'No autorizado' })
  @ApiNotFoundResponse({ description: 'Usuario no encontrado' })
  async register(
    @Res() res: Response,
    @Body() dto: RegisterDeviceDto,
  ): Promise<Response> {
    const userId = this.asyncContextService.requireActorId();
    const response = await this.deviceRegistrationService.registerDevice(
      userId,
      dto.deviceId,
      dto.deviceName,
    );
    return res.status(response.statusCode).json(response);
  }

  @Delete()
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Eliminar dispositivo registrado' })
  @ApiOkResponse({ description: 'Slot liberado (idempotente)' })
  async unregister(@Res() res: Response): Promise<Response> {
    const userId = this.asyncContextService.requireActorId();
    const response = await this.deviceRegistrationService.unregisterDevice(userId);
    return res.status(response.statusCode).json(response);
  }
}
