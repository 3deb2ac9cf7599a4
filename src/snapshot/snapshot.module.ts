import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { CommonModule } from '../common/common.module';
import { SnapshotDriver } from '../config/env.validation';
import { SnapshotEntity } from './entities/snapshot.entity';
import { SnapshotController } from './snapshot.controller';
import { SnapshotStore } from './snapshot-store';
import { FileSnapshotStore } from './stores/file-snapshot.store';
import { TypeOrmSnapshotStore } from './stores/typeorm-snapshot.store';

@Module({
  imports: [
    TypeOrmModule.forFeature([SnapshotEntity]),
    ConfigModule,
    CommonModule,
  ],
  controllers: [SnapshotController],
  providers: [
    FileSnapshotStore,
    TypeOrmSnapshotStore,
    {
      provide: SnapshotStore,
      inject: [ConfigService, FileSnapshotStore, TypeOrmSnapshotStore],
      useFactory: (
        configService: ConfigService,
        fileStore: FileSnapshotStore,
        databaseStore: TypeOrmSnapshotStore,
      ): SnapshotStore =>
        configService.get<SnapshotDriver>('SNAPSHOT_DRIVER', 'file') ===
        'database'
          ? databaseStore
          : fileStore,
    },
  ],
  exports: [SnapshotStore],
})
export class SnapshotModule {}
