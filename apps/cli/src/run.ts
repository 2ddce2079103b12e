import { readFile, stat, writeFile } from "node:fs/promises";
import { resolve } from "node:path";
import {
  type ExtractorRegistry,
  type FormatMatch,
  createDefaultRegistry,
  detectFormat,
} from "@mailsift/file-extract";
import { ValidationError, errorMessage, formatEmailRecords, scanEmails } from "@mailsift/utils";
import type pino from "pino";
import type { Config } from "./config.js";

export interface RunOptions {
  config: Config;
  logger: pino.Logger;
  cwd?: string;
  registry?: ExtractorRegistry;
}

export interface RunSummary {
  inputPath: string;
  sizeBytes: number;
  format: FormatMatch;
  blockCount: number;
  emails: string[];
  outputPath: string | null;
}

export async function processFile(inputPath: string, options: RunOptions): Promise<RunSummary> {
  const { config, logger } = options;
  const cwd = options.cwd ?? process.cwd();
  const absolutePath = resolve(cwd, inputPath);

  const info = await stat(absolutePath);
  logger.info(`File path: ${inputPath}.`);
  logger.info(`File size: ${info.size} bytes.`);

  if (!info.isFile()) {
    throw new ValidationError(`Not a regular file: ${inputPath}`);
  }
  if (info.size > config.maxFileBytes) {
    throw new ValidationError(
      `File is ${info.size} bytes, the limit is ${config.maxFileBytes} bytes`,
    );
  }

  const buffer = await readFile(absolutePath);
  const format = detectFormat(buffer);
  logger.info(`Detected format: ${format.format} (${format.mime}).`);

  const registry = options.registry ?? createDefaultRegistry();
  const result = await registry.extract(format.tag, buffer, format.format);
  logger.info(`File processed successfully, ${result.blocks.length} text blocks extracted.`);

  const emails = scanEmails(result.blocks.map((block) => block.text));
  let outputPath: string | null = null;

  if (emails.length > 0) {
    const target = resolve(cwd, config.outputFile);
    try {
      await writeFile(target, formatEmailRecords(emails), "utf-8");
      outputPath = target;
      logger.info(`Extracted ${emails.length} email addresses, written to ${target}.`);
    } catch (err) {
      logger.error({ err }, `Failed to write emails to file. ${errorMessage(err)}.`);
    }
  } else {
    logger.warn("No email address found.");
  }

  return {
    inputPath,
    sizeBytes: info.size,
    format,
    blockCount: result.blocks.length,
    emails,
    outputPath,
  };
}
