import type { Response } from 'express';

import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Post,
  Res,
  UseGuards,
} from '@nestjs/common';
import {
  ApiBadRequestResponse,
  ApiBearerAuth,
  ApiBody,
  ApiConflictResponse,
  ApiCreatedResponse,
  ApiOkResponse,
  ApiOperation,
  ApiTags,
  ApiTooManyRequestsResponse,
  ApiUnauthorizedResponse,
} from '@nestjs/swagger';
import { Throttle } from '@nestjs/throttler';

import { AsyncContextService } from '../../../../common/context/async-context.service';
import { AuthService } from '../../application/auth.service';
import { LoginDto, RefreshTokenDto, SignupDto } from '../../dto';
import { JwtAuthGuard } from '../../guards/jwt-auth.guard';

@ApiTags('Auth')
@Controller('auth')
export class AuthController {
  constructor(
    private readonly authService: AuthService,
    private readonly asyncContextService: AsyncContextService,
  ) {}

  @Post('signup')
  @HttpCode(HttpStatus.CREATED)
  @Throttle({ default: { limit: 5, ttl: 60000 } })
  @ApiOperation({
    summary: 'Registrar usuario',
    description: 'Crea la cuenta y devuelve access y refresh tokens',
  })
  @ApiBody({
    type: SignupDto,
    examples: {
      example1: {
        summary: 'Registro',
        value: {
          email: 'reader@example.com',
          password: 'Password123!',
          firstName: 'Ada',
          lastName: 'Lovelace',
        },
      },
    },
  })
  @ApiCreatedResponse({ description: 'Usuario registrado exitosamente' })
  @ApiBadRequestResponse({ description: 'Datos inválidos' })
  @ApiConflictResponse({ description: 'El email ya está registrado' })
  @ApiTooManyRequestsResponse({ description: 'Demasiados intentos' })
  async signup(@Res() res: Response, @Body() dto: SignupDto): Promise<Response> {
    const response = await this.authService.signup(dto);
    return res.status(response.statusCode).json(response);
  }

  @Post('login')
  @HttpCode(HttpStatus.OK)
  @Throttle({ default: { limit: 10, ttl: 60000 } })
  @ApiOperation({
    summary: 'Iniciar sesión',
    description: 'Autentica un usuario y retorna los tokens JWT',
  })
  @ApiBody({ type: LoginDto })
  @ApiOkResponse({ description: 'Login exitoso' })
  @ApiUnauthorizedResponse({ description: 'Email o contraseña inválidos' })
  @ApiTooManyRequestsResponse({ description: 'Demasiados intentos' })
  async login(@Res() res: Response, @Body() dto: LoginDto): Promise<Response> {
    const response = await this.authService.login(dto);
    return res.status(response.statusCode).json(response);
  }

  @Post('refresh')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Renovar token de acceso' })
  @ApiBody({ type: RefreshTokenDto })
  @ApiOkResponse({ description: 'Token renovado exitosamente' })
  @ApiUnauthorizedResponse({ description: 'Refresh token inválido o expirado' })
  async refresh(@Res() res: Response, @Body() dto: RefreshTokenDto): Promise<Response> {
    const response = await this.authService.refresh(dto);
    return res.status(response.statusCode).json(response);
  }

  @Post('logout')
  @HttpCode(HttpStatus.OK)
  @UseGuards(JwtAuthGuard)
  @ApiBearerAuth('access-token')
  @ApiOperation({ summary: 'Cerrar sesión' })
  @ApiOkResponse({ description: 'Logout exitoso' })
  @ApiUnauthorizedResponse({ description: 'No autorizado' })
  logout(@Res() res: Response): Response {
    const userId = this.asyncContextService.requireActorId();
    const response = this.authService.logout(userId);
    return res.status(response.statusCode).json(response);
  }

  @Get('me')
  @HttpCode(HttpStatus.OK)
  @UseGuards(JwtAuthGuard)
  @ApiBearerAuth('access-token')
  @ApiOperation({ summary: 'Usuario autenticado' })
  @ApiOkResponse({ description: 'Datos del usuario autenticado' })
  @ApiUnauthorizedResponse({ description: 'No autorizado' })
  async me(@Res() res: Response): Promise<Response> {
    const userId = this.asyncContextService.requireActorId();
    const response = await this.authService.me(userId);
    return res.status(response.statusCode).json(response);
  }
}
