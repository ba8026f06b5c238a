import type { Response } from 'express';

import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Patch,
  Put,
  Res,
  UseGuards,
} from '@nestjs/common';
import {
  ApiBadRequestResponse,
  ApiBearerAuth,
  ApiBody,
  ApiConflictResponse,
  ApiOkResponse,
  ApiOperation,
  ApiTags,
  ApiUnauthorizedResponse,
} from '@nestjs/swagger';

import { AsyncContextService } from '../../../../common/context/async-context.service';
import { JwtAuthGuard } from '../../../auth/guards/jwt-auth.guard';
import { UsersService } from '../../application/users.service';
import { ChangePasswordDto, UpdateProfileDto } from '../../dto';

/**
 * ProfileController: el usuario autenticado gestiona su propio perfil.
 * El userId sale siempre del JWT.
 */
@ApiTags('Profile')
@ApiBearerAuth('access-token')
@UseGuards(JwtAuthGuard)
@Controller('profile')
export class ProfileController {
  constructor(
    private readonly usersService: UsersService,
    private readonly asyncContextService: AsyncContextService,
  ) {}

  @Get()
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Obtener mi perfil' })
  @ApiOkResponse({ description: 'Perfil del usuario autenticado' })
  @ApiUnauthorizedResponse({ description: 'No autorizado' })
  async getProfile(@Res() res: Response): Promise<Response> {
    const userId = this.asyncContextService.requireActorId();
    const response = await this.usersService.getProfile(userId);
    return res.status(response.statusCode).json(response);
  }

  /**
   * Actualizar datos del perfil del usuario autenticado
   * PATCH /profile
   */
  @Patch()
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Actualizar mi perfil',
    description: 'Todos los campos son opcionales.',
  })
  @ApiBody({
    type: UpdateProfileDto,
    examples: {
      example1: {
        summary: 'Actualizar nombre',
        value: { firstName: 'Ada', lastName: 'Lovelace' },
      },
    },
  })
  @ApiOkResponse({ description: 'Perfil actualizado exitosamente' })
  @ApiBadRequestResponse({ description: 'Datos inválidos' })
  @ApiConflictResponse({ description: 'El email ya está registrado' })
  async updateProfile(
    @Res() res: Response,
    @Body() dto: UpdateProfileDto,
  ): Promise<Response> {
    const userId = this.asyncContextService.requireActorId();
    const response = await this.usersService.updateProfile(userId, dto);
    return res.status(response.statusCode).json(response);
  }

  @Put('password')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Cambiar mi contraseña' })
  @ApiBody({ type: ChangePasswordDto })
  @ApiOkResponse({ description: 'Contraseña actualizada exitosamente' })
  @ApiBadRequestResponse({ description: 'Contraseña actual incorrecta' })
  async changePassword(
    @Res() res: Response,
    @Body() dto: ChangePasswordDto,
  ): Promise<Response> {
    const userId = this.asyncContextService.requireActorId();
    const response = await this.usersService.changePassword(userId, dto);
    return res.status(response.statusCode).json(response);
  }

  @Delete()
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Eliminar mi cuenta',
    description: 'Borrado lógico; el historial de compras se conserva.',
  })
  @ApiOkResponse({ description: 'Cuenta eliminada exitosamente' })
  async deleteAccount(@Res() res: Response): Promise<Response> {
    const userId = this.asyncContextService.requireActorId();
    const response = await this.usersService.deleteAccount(userId);
    return res.status(response.statusCode).json(response);
  }
}
