import {
  BadRequestException,
  ConflictException,
  InternalServerErrorException,
  NotFoundException,
} from '@nestjs/common';

export class CrawlConflictException extends ConflictException {
  constructor() {
    super('A crawl is already in progress');
  }
}

export class CrawlValidationException extends BadRequestException {}

export class SnapshotNotFoundException extends NotFoundException {
  constructor(key: string) {
    super(`Snapshot ${key} not found`);
  }
}

export class SnapshotStorageException extends InternalServerErrorException {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}
