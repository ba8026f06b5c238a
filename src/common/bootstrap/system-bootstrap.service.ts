import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { CatalogSeedService } from '../../modules/books/seeds/catalog-seed.service';

/**
 * SystemBootstrapService - Inicialización centralizada del sistema
 *
 * PHASE 1: catálogo de libros (si SEED_CATALOG está activo)
 *
 * Un fallo en el bootstrap se registra y no impide que la app arranque.
 */
@Injectable()
export class SystemBootstrapService implements OnModuleInit {
  private readonly logger = new Logger(SystemBootstrapService.name);

  constructor(
    private readonly configService: ConfigService,
    private readonly catalogSeedService: CatalogSeedService,
  ) {}

  async onModuleInit(): Promise<void> {
    this.logger.log('🚀 Starting system bootstrap initialization...');

    try {
      await this.bootstrapCatalog();
      this.logger.log('✅ System bootstrap completed successfully');
    } catch (error) {
      this.logger.error(
        `❌ System bootstrap failed: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
    }
  }

  /**
   * PHASE 1: Bootstrap catálogo
   */
  private async bootstrapCatalog(): Promise<void> {
    if (!this.configService.get<boolean>('SEED_CATALOG')) {
      this.logger.log('   ⏭️  SEED_CATALOG disabled - skipping catalog seed');
      return;
    }

    this.logger.log('📚 PHASE 1: Bootstrap catalog...');
    const inserted = await this.catalogSeedService.seedIfEmpty();
    this.logger.log(`✅ PHASE 1 completed: ${inserted} books seeded`);
  }
}
