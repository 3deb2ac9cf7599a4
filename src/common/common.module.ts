import { Module } from '@nestjs/common';
import { ContentCodecService } from './services/content-codec.service';
import { ContentNormalizerService } from './services/content-normalizer.service';

@Module({
  providers: [ContentCodecService, ContentNormalizerService],
  exports: [ContentCodecService, ContentNormalizerService],
})
export class CommonModule {}
