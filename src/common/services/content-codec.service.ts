import { Injectable, InternalServerErrorException } from '@nestjs/common';
import * as zlib from 'zlib';
import * as crypto from 'crypto';
import { promisify } from 'util';

const deflate = promisify(zlib.deflate);
const inflate = promisify(zlib.inflate);

export interface EncodedContent {
  payload: Buffer;
  contentHash: string;
  originalSize: number;
  compressedSize: number;
}

@Injectable()
export class ContentCodecService {
  async encode(content: string): Promise<EncodedContent> {
    const payload = await this.compress(content);
    return {
      payload,
      contentHash: this.calculateHash(content),
      originalSize: Buffer.byteLength(content),
      compressedSize: payload.length,
    };
  }

  /**
   * Inflates a payload produced by {@link encode} and, when a hash is given,
   * checks the result against it.
   */
  async decode(payload: Buffer, expectedHash?: string): Promise<string> {
    const content = await this.decompress(payload);
    if (expectedHash && this.calculateHash(content) !== expectedHash) {
      throw new InternalServerErrorException(
        'Decoded content does not match its hash',
      );
    }
    return content;
  }

  async compress(content: string): Promise<Buffer> {
    try {
      return await deflate(content);
    } catch (error) {
      throw new InternalServerErrorException('Failed to compress content', {
        cause: error,
      });
    }
  }

  async decompress(buffer: Buffer): Promise<string> {
    try {
      const result = await inflate(buffer);
      return result.toString('utf-8');
    } catch (error) {
      throw new InternalServerErrorException('Failed to decompress content', {
        cause: error,
      });
    }
  }

  calculateHash(content: string): string {
    return crypto.createHash('sha256').update(content).digest('hex');
  }
}
