import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { BooksModule } from '../../modules/books/books.module';
import { SystemBootstrapService } from './system-bootstrap.service';

/**
 * BootstrapModule - Módulo para la inicialización del sistema
 *
 * Se ejecuta automáticamente en onModuleInit.
 */
@Module({
  imports: [ConfigModule, BooksModule],
  providers: [SystemBootstrapService],
  exports: [SystemBootstrapService],
})
export class BootstrapModule {}
