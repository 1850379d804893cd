export interface CompressionInfo {
  /** Path of the .gz file that replaced the input */
  filePath: string;
  originalSize: number;
  compressedSize: number;
}

export interface Compressor {
  /** Gzip a file to `<path>.gz` and remove the original */
  compress(filePath: string): Promise<CompressionInfo>;
}
