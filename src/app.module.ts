import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { configValidationSchema } from './config/config.schema';
import { LocksModule } from './locks/locks.module';
import { PersistenceModule } from './persistence/persistence.module';
import { AIModule } from './ai/ai.module';
import { MemoryModule } from './memory/memory.module';
import { SessionModule } from './session/session.module';

@Module({
  imports: [
    // Loads .env before PersistenceModule.register() reads MONGODB_ENABLED
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'],
      validationSchema: configValidationSchema,
    }),
    EventEmitterModule.forRoot(),
    LocksModule,
    PersistenceModule.register(),
    AIModule,
    MemoryModule,
    SessionModule,
  ],
  controllers: [AppController],
  providers: [AppService],
})
export class AppModule {}
