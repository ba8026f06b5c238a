import type { Response } from 'express';

import { Controller, Get, HttpCode, HttpStatus, Param, Query, Res } from '@nestjs/common';
import {
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiParam,
  ApiTags,
} from '@nestjs/swagger';

import { BooksService } from '../../application/books.service';
import { ListBooksQueryDto, SearchBooksQueryDto } from '../../dto';

/**
 * BooksController: catálogo público (no requiere autenticación).
 */
@ApiTags('Books')
@Controller('books')
export class BooksController {
  constructor(private readonly booksService: BooksService) {}

  /**
   * GET /books
   */
  @Get()
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Listar libros',
    description: 'Libros disponibles, paginados. Orden por defecto: título ascendente.',
  })
  @ApiOkResponse({ description: 'Página de libros con meta.pagination' })
  async list(
    @Res() res: Response,
    @Query() query: ListBooksQueryDto,
  ): Promise<Response> {
    const response = await this.booksService.listBooks(query);
    return res.status(response.statusCode).json(response);
  }

  @Get('search')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Búsqueda avanzada de libros' })
  async search(
    @Res() res: Response,
    @Query() query: SearchBooksQueryDto,
  ): Promise<Response> {
    const response = await this.booksService.searchBooks(query);
    return res.status(response.statusCode).json(response);
  }

  @Get('genres')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Géneros disponibles' })
  async genres(@Res() res: Response): Promise<Response> {
    const response = await this.booksService.listGenres();
    return res.status(response.statusCode).json(response);
  }

  @Get(':bookId')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Detalle de un libro' })
  @ApiParam({ name: 'bookId', type: String })
  @ApiNotFoundResponse({ description: 'Libro no encontrado' })
  async get(
    @Res() res: Response,
    @Param('bookId') bookId: string,
  ): Promise<Response> {
    const response = await this.booksService.getBook(bookId);
    return res.status(response.statusCode).json(response);
  }
}
