import { ConfigService } from '@nestjs/config';
import { TypeOrmModuleOptions } from '@nestjs/typeorm';
import { SnapshotEntity } from '../snapshot/entities/snapshot.entity';

export const typeOrmConfigFactory = (
  configService: ConfigService,
): TypeOrmModuleOptions => {
  const isTest = configService.get<string>('NODE_ENV') === 'test';

  return {
    type: 'sqlite',
    database: isTest
      ? ':memory:'
      : configService.get<string>('DATABASE_PATH', 'data/site-crawler.db'),
    entities: [SnapshotEntity],
    synchronize: true,
    logging: configService.get<string>('NODE_ENV') === 'development',
  };
};
