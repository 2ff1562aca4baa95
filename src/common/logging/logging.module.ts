import { Global, Module } from '@nestjs/common';
import { StructuredLoggerService } from './structured-logger.service';
import { AuditContextService } from '../../modules/audit/audit-context.service';
import { AuditService } from '../../modules/audit/audit.service';

const providers = [StructuredLoggerService, AuditContextService, AuditService];

/** Logging and audit tracing, available to every feature module. */
@Global()
@Module({
  providers,
  exports: providers,
})
export class LoggingModule {}
