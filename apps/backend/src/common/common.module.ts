import { Global, Module } from '@nestjs/common';
import { AppLoggerService } from './services/app-logger.service';
import { DatabaseService } from './services/database.service';
import { PasswordHasherService } from './services/password-hasher.service';
import { RequestContextService } from './services/request-context.service';

@Global()
@Module({
  providers: [
    DatabaseService,
    AppLoggerService,
    RequestContextService,
    PasswordHasherService,
  ],
  exports: [
    DatabaseService,
    AppLoggerService,
    RequestContextService,
    PasswordHasherService,
  ],
})
export class CommonModule {}
