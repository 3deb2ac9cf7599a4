import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AppController } from './app.controller';
import { CrawlerModule } from './crawler/crawler.module';
import { SnapshotModule } from './snapshot/snapshot.module';
import { validateEnv } from './config/env.validation';
import { typeOrmConfigFactory } from './config/typeorm.config';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnv,
    }),
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: typeOrmConfigFactory,
    }),
    SnapshotModule,
    CrawlerModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
