import { createReadStream, createWriteStream, promises as fs } from 'fs';
import { pipeline } from 'stream/promises';
import { createGzip } from 'zlib';
import { Compressor, CompressionInfo } from '../interfaces/Compressor';
import { Logger } from '../interfaces/Logger';
import { CompressionError, formatError, toError } from '../errors';

/**
 * Gzip compressor that replaces the input file with `<input>.gz`
 */
export class GzipCompressor implements Compressor {
  private level: number;
  private logger: Logger;

  constructor(logger: Logger, level: number = 9) {
    this.logger = logger;
    this.level = level;
  }

  async compress(filePath: string): Promise<CompressionInfo> {
    const outputPath = `${filePath}.gz`;

    try {
      const { size: originalSize } = await fs.stat(filePath);

      await pipeline(
        createReadStream(filePath),
        createGzip({ level: this.level }),
        createWriteStream(outputPath)
      );
      await fs.unlink(filePath);

      const { size: compressedSize } = await fs.stat(outputPath);

      this.logger.debug('Dump compressed', {
        inputPath: filePath,
        outputPath,
        originalSize,
        compressedSize,
      });

      return { filePath: outputPath, originalSize, compressedSize };
    } catch (error) {
      throw new CompressionError(
        `Failed to compress ${filePath}: ${formatError(error)}`,
        toError(error)
      );
    }
  }
}
