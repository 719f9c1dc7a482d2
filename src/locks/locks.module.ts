import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { LockRegistry } from './lock-registry';

@Global()
@Module({
  imports: [ConfigModule],
  providers: [LockRegistry],
  exports: [LockRegistry],
})
export class LocksModule {}
