/**
 * Copy converter
 * Minimal plugin that copies each input chunk by chunk, reporting progress
 */

import { open, stat } from "fs/promises";
import path from "node:path";
import { ConverterBase } from "../converter";
import type { OptionSchemaBuilder } from "../modules/schema";
import type { ResolvedOptions } from "../utils/resolved-options";
import { formatTimestamp } from "../utils/time-format";
import type { ParseStatus } from "../types";

const DEFAULT_SUFFIX = "_copy";
const DEFAULT_CHUNK_SIZE = 64 * 1024;

export class CopyConverter extends ConverterBase {
  readonly programName = "mf4copy";

  private suffix = DEFAULT_SUFFIX;
  private chunkSize = DEFAULT_CHUNK_SIZE;

  configureParser(schema: OptionSchemaBuilder): void {
    schema.string("suffix", {
      description: "Text appended to the name of every copied file.",
      valueName: "text",
      defaultValue: DEFAULT_SUFFIX,
    });
  }

  configureFileParser(schema: OptionSchemaBuilder): void {
    schema.integer("chunk-size", {
      description: "Bytes copied between two progress updates.",
      valueName: "bytes",
      defaultValue: DEFAULT_CHUNK_SIZE,
    });
  }

  usesConfigFile(): boolean {
    return true;
  }

  parseOptions(options: ResolvedOptions): Partial<ParseStatus> {
    this.suffix = options.getString("suffix") ?? DEFAULT_SUFFIX;

    const chunkSize = options.getInteger("chunk-size") ?? DEFAULT_CHUNK_SIZE;
    if (chunkSize <= 0) {
      throw new Error(`chunk-size must be positive, got ${chunkSize}`);
    }
    this.chunkSize = chunkSize;

    return {};
  }

  targetPath(inputPath: string, outputDirectory: string): string {
    const extension = path.extname(inputPath);
    const name = path.basename(inputPath, extension);
    return path.join(outputDirectory, `${name}${this.suffix}${extension}`);
  }

  async convert(inputPath: string, outputDirectory: string): Promise<boolean> {
    const target = this.targetPath(inputPath, outputDirectory);
    if (path.resolve(target) === path.resolve(inputPath)) {
      this.logger.error(`Refusing to copy "${inputPath}" onto itself`);
      return false;
    }

    const info = await stat(inputPath);
    const total = info.size;
    this.logger.info(
      `Copying "${inputPath}" (modified ${formatTimestamp(info.mtime, this.commonOptions.timeDisplay)})`,
    );

    const source = await open(inputPath, "r");
    try {
      const destination = await open(target, "w");
      try {
        const buffer = Buffer.alloc(Math.max(1, Math.min(this.chunkSize, total)));
        let copied = 0;

        while (copied < total) {
          const { bytesRead } = await source.read(buffer, 0, buffer.length, copied);
          if (bytesRead === 0) break;

          await destination.write(buffer, 0, bytesRead);
          copied += bytesRead;
          if (copied < total) this.reportProgress(copied, total);
        }
      } finally {
        await destination.close();
      }
    } finally {
      await source.close();
    }

    this.reportProgress(total, total);
    this.logger.debug(`Wrote "${target}"`);
    return true;
  }

  getVersion(): string {
    return "0.1.0";
  }
}
