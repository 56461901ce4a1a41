import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AuditLoggerService } from './services/audit-logger.service';
import { AuditExceptionFilter } from './filters/audit-exception.filter';
import { ApiEnabledGuard } from './guards/api-enabled.guard';

@Module({
  imports: [ConfigModule],
  providers: [AuditLoggerService, AuditExceptionFilter, ApiEnabledGuard],
  exports: [AuditLoggerService, AuditExceptionFilter, ApiEnabledGuard],
})
export class CommonModule {}
