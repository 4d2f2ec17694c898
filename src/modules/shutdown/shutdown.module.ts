import { Global, Module } from '@nestjs/common';
import { ShutdownService } from './shutdown.service.js';
import { shutdownConfigProvider, SHUTDOWN_CONFIG } from '../../config/shutdown-config.provider.js';

/**
 * Global module for graceful shutdown management
 */
@Global()
@Module({
  providers: [shutdownConfigProvider, ShutdownService],
  exports: [ShutdownService, SHUTDOWN_CONFIG],
})
export class ShutdownModule {}
