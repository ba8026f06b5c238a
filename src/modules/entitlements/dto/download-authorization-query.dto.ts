import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString } from 'class-validator';

export class DownloadAuthorizationQueryDto {
  @ApiProperty({ description: 'ID del libro', example: '3f1c2a9e-7b1d-4a52-9f0e-1b2c3d4e5f60' })
  @IsString()
  @IsNotEmpty({ message: 'bookId es requerido' })
  bookId!: string;
}
