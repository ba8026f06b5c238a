import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsEmail, IsOptional, IsString, MaxLength, MinLength } from 'class-validator';

/**
 * UpdateProfileDto: datos editables del perfil (PATCH, todo opcional).
 * La contraseña tiene su propio endpoint.
 */
export class UpdateProfileDto {
  @ApiPropertyOptional({ example: 'Ada' })
  @IsOptional()
  @IsString({ message: 'firstName debe ser una cadena de texto' })
  @MinLength(1)
  @MaxLength(50, { message: 'firstName no puede exceder 50 caracteres' })
  firstName?: string;

  @ApiPropertyOptional({ example: 'Lovelace' })
  @IsOptional()
  @IsString({ message: 'lastName debe ser una cadena de texto' })
  @MinLength(1)
  @MaxLength(50, { message: 'lastName no puede exceder 50 caracteres' })
  lastName?: string;

  @ApiPropertyOptional({ example: 'ada@example.com' })
  @IsOptional()
  @IsEmail({}, { message: 'Email debe ser válido' })
  email?: string;
}
