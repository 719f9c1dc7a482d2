import { Module, Global } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { SessionService } from './session.service';
import { SessionStoreService } from './session-store.service';
import { SessionCleanupService } from './session-cleanup.service';
import { MemoryModule } from '../memory/memory.module';

@Global()
@Module({
  imports: [ConfigModule, MemoryModule],
  providers: [SessionStoreService, SessionCleanupService, SessionService],
  exports: [SessionService, SessionStoreService, SessionCleanupService],
})
export class SessionModule {}
