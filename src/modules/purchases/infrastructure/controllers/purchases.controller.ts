import type { Response } from 'express';

import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Query,
  Res,
  UseGuards,
} from '@nestjs/common';
import {
  ApiBearerAuth,
  ApiBody,
  ApiConflictResponse,
  ApiCreatedResponse,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiParam,
  ApiTags,
  ApiUnauthorizedResponse,
} from '@nestjs/swagger';

import { AsyncContextService } from '../../../../common/context/async-context.service';
import { JwtAuthGuard } from '../../../auth/guards/jwt-auth.guard';
import { PurchaseQueryService } from '../../application/purchase-query.service';
import { PurchaseService } from '../../application/purchase.service';
import { CreatePurchaseDto, ListPurchasesQueryDto } from '../../dto';

/**
 * PurchasesController: compra, historial, propiedad y reembolso.
 */
@ApiTags('Purchases')
@ApiBearerAuth('access-token')
@UseGuards(JwtAuthGuard)
@Controller()
export class PurchasesController {
  constructor(
    private readonly purchaseService: PurchaseService,
    private readonly purchaseQueryService: PurchaseQueryService,
    private readonly asyncContextService: AsyncContextService,
  ) {}

  /**
   * POST /purchase
   */
  @Post('purchase')
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({
    summary: 'Comprar un libro',
    description:
      'Registra la compra (el medio de pago se guarda tal cual). Devuelve el id de compra y la referencia de descarga.',
  })
  @ApiBody({
    type: CreatePurchaseDto,
    examples: {
      example1: {
        summary: 'Tarjeta',
        value: {
          bookId: '3f1c2a9e-7b1d-4a52-9f0e-1b2c3d4e5f60',
          paymentMethod: 'credit_card',
        },
      },
    },
  })
  @ApiCreatedResponse({ description: 'Libro comprado exitosamente' })
  @ApiNotFoundResponse({ description: 'Libro no encontrado' })
  @ApiConflictResponse({ description: 'Ya posees este libro' })
  @ApiUnauthorizedResponse({ description: 'No autorizado' })
  async purchase(
    @Res() res: Response,
    @Body() dto: CreatePurchaseDto,
  ): Promise<Response> {
    const userId = this.asyncContextService.requireActorId();
    const response = await this.purchaseService.purchase(
      userId,
      dto.bookId,
      dto.paymentMethod,
    );
    return res.status(response.statusCode).json(response);
  }

  @Get('purchases')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Historial de compras' })
  @ApiOkResponse({ description: 'Compras del usuario, más reciente primero' })
  async list(
    @Res() res: Response,
    @Query() query: ListPurchasesQueryDto,
  ): Promise<Response> {
    const userId = this.asyncContextService.requireActorId();
    const response = await this.purchaseQueryService.listPurchases(
      userId,
      query.status,
    );
    return res.status(response.statusCode).json(response);
  }

  @Get('purchases/books')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Libros comprados' })
  async library(@Res() res: Response): Promise<Response> {
    const userId = this.asyncContextService.requireActorId();
    const response = await this.purchaseQueryService.listPurchasedBooks(userId);
    return res.status(response.statusCode).json(response);
  }

  @Get('books/check-ownership/:bookId')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Verificar si el usuario posee un libro' })
  @ApiParam({ name: 'bookId', type: String })
  @ApiNotFoundResponse({ description: 'Libro o usuario no encontrado' })
  async checkOwnership(
    @Res() res: Response,
    @Param('bookId') bookId: string,
  ): Promise<Response> {
    const userId = this.asyncContextService.requireActorId();
    const response = await this.purchaseQueryService.checkOwnership(userId, bookId);
    return res.status(response.statusCode).json(response);
  }

  @Post('purchases/:purchaseId/refund')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Reembolsar una compra',
    description: 'completed → refunded. Revoca la descarga; la compra se conserva.',
  })
  @ApiParam({ name: 'purchaseId', type: String })
  @ApiConflictResponse({ description: 'Transición inválida' })
  async refund(
    @Res() res: Response,
    @Param('purchaseId') purchaseId: string,
  ): Promise<Response> {
    const userId = this.asyncContextService.requireActorId();
    const response = await this.purchaseService.refund(userId, purchaseId);
    return res.status(response.statusCode).json(response);
  }
}
