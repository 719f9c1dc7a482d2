import { Global, Module, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { MongooseModule } from '@nestjs/mongoose';
import { readString } from '../config/config.utils';

export const DATABASE_DEFAULTS = {
  URI: 'mongodb://localhost:27017/conversation-sessions',
} as const;

const resolveMongoUri = (configService: ConfigService): string =>
  readString(configService, 'MONGODB_URI') ?? DATABASE_DEFAULTS.URI;

/**
 * Hide the password of a connection string for logging
 */
export const maskMongoUri = (uri: string): string =>
  uri.replace(/:\/\/([^:/@]+):([^@]+)@/, '://$1:****@');

/**
 * Global MongoDB connection, imported only when durable storage is enabled
 */
@Global()
@Module({
  imports: [
    MongooseModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        uri: resolveMongoUri(configService),
        retryAttempts: 3,
        retryDelay: 1000,
        serverSelectionTimeoutMS: 5000,
        connectTimeoutMS: 10000,
      }),
    }),
  ],
})
export class DatabaseModule implements OnModuleInit {
  private readonly logger = new Logger(DatabaseModule.name);

  constructor(private readonly configService: ConfigService) {}

  onModuleInit(): void {
    this.logger.log(
      `MongoDB connection initialized: ${maskMongoUri(resolveMongoUri(this.configService))}`,
    );
  }
}
