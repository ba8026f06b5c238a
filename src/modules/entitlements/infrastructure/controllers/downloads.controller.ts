import type { Response } from 'express';

import {
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Query,
  Res,
  UseGuards,
} from '@nestjs/common';
import {
  ApiBearerAuth,
  ApiForbiddenResponse,
  ApiOkResponse,
  ApiOperation,
  ApiParam,
  ApiTags,
  ApiUnauthorizedResponse,
} from '@nestjs/swagger';

import { AsyncContextService } from '../../../../common/context/async-context.service';
import { JwtAuthGuard } from '../../../auth/guards/jwt-auth.guard';
import { DownloadAuthorizationService } from '../../application/download-authorization.service';
import { DownloadAuthorizationQueryDto } from '../../dto';

@ApiTags('Downloads')
@ApiBearerAuth('access-token')
@UseGuards(JwtAuthGuard)
@Controller()
export class DownloadsController {
  constructor(
    private readonly downloadAuthorizationService: DownloadAuthorizationService,
    private readonly asyncContextService: AsyncContextService,
  ) {}

  /**
   * GET /download-authorization?bookId=
   */
  @Get('download-authorization')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Verificar si puedo descargar un libro',
    description:
      'Devuelve permitted=true con purchaseId y deviceId, o permitted=false con reason NOT_PURCHASED | NO_DEVICE.',
  })
  @ApiOkResponse({ description: 'Decisión de descarga' })
  @ApiUnauthorizedResponse({ description: 'No autorizado' })
  async authorize(
    @Res() res: Response,
    @Query() query: DownloadAuthorizationQueryDto,
  ): Promise<Response> {
    const userId = this.asyncContextService.requireActorId();
    const response = await this.downloadAuthorizationService.authorizeDownload(
      userId,
      query.bookId,
    );
    return res.status(response.statusCode).json(response);
  }

  @Get('books/:bookId/download')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Descargar un libro',
    description: 'Consume una descarga de la compra y devuelve un enlace temporal.',
  })
  @ApiParam({ name: 'bookId', type: String })
  @ApiForbiddenResponse({
    description: 'NOT_PURCHASED | NO_DEVICE | DOWNLOAD_LIMIT_REACHED',
  })
  async download(
    @Res() res: Response,
    @Param('bookId') bookId: string,
  ): Promise<Response> {
    const userId = this.asyncContextService.requireActorId();
    const response = await this.downloadAuthorizationService.download(userId, bookId);
    return res.status(response.statusCode).json(response);
  }
}
