import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

export class CreatePurchaseDto {
  @ApiProperty({ description: 'ID del libro', example: '3f1c2a9e-7b1d-4a52-9f0e-1b2c3d4e5f60' })
  @IsString()
  @IsNotEmpty()
  bookId!: string;

  @ApiProperty({
    description: 'Medio de pago (se registra tal cual, sin pasarela)',
    example: 'credit_card',
  })
  @IsString()
  @IsNotEmpty()
  @MaxLength(50)
  paymentMethod!: string;
}
