import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

export class RegisterDeviceDto {
  @ApiProperty({
    description: 'Identificador del dispositivo',
    example: 'ios-123',
  })
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  deviceId!: string;

  @ApiProperty({
    description: 'Nombre amigable del dispositivo',
    example: 'Mi iPhone',
  })
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  deviceName!: string;
}
