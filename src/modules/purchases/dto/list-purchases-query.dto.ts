import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsEnum, IsOptional } from 'class-validator';

import { PurchaseStatus } from '../domain/entities/purchase.entity';

export class ListPurchasesQueryDto {
  @ApiPropertyOptional({ enum: PurchaseStatus })
  @IsOptional()
  @IsEnum(PurchaseStatus, { message: 'status no válido' })
  status?: PurchaseStatus;
}
