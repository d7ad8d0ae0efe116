/**
 * jsonFileHandler.ts
 * JSON file I/O with atomic replace and rotating backups
 */

import fs from 'fs';
import path from 'path';

import { logger } from '../utils/logger.js';
import { safeJsonParse, safeJsonStringify } from '../utils/json-utils.js';

export interface JsonFileHandlerOptions {
  createBackups?: boolean;
  maxBackups?: number;
}

export class JsonFileHandler {
  readonly filePath: string;
  private options: Required<JsonFileHandlerOptions>;

  constructor(filePath: string, options: JsonFileHandlerOptions = {}) {
    this.filePath = filePath;
    this.options = {
      createBackups: options.createBackups ?? true,
      maxBackups: options.maxBackups ?? 5,
    };

    const dir = path.dirname(filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  /**
   * Returns the parsed file content, or null when the file is missing or unreadable
   */
  read(): unknown {
    try {
      if (!fs.existsSync(this.filePath)) {
        return null;
      }

      const content = fs.readFileSync(this.filePath, 'utf-8');
      return safeJsonParse(content);
    } catch (error) {
      logger.error(`[JsonFileHandler] Error reading ${this.filePath}`, { error });
      return null;
    }
  }

  /**
   * Writes to a temp file and renames it over the target, so readers never see a partial file
   */
  write(data: unknown): boolean {
    const tempPath = `${this.filePath}.tmp`;
    try {
      if (this.options.createBackups && fs.existsSync(this.filePath)) {
        this.createBackup();
      }

      const content = safeJsonStringify(data, 2);
      if (content === '') {
        throw new Error('Refusing to write unserializable data');
      }

      fs.writeFileSync(tempPath, content, 'utf-8');
      fs.renameSync(tempPath, this.filePath);

      return true;
    } catch (error) {
      logger.error(`[JsonFileHandler] Error writing ${this.filePath}`, { error });

      try {
        if (fs.existsSync(tempPath)) {
          fs.unlinkSync(tempPath);
        }
      } catch (cleanupError) {
        logger.warn(`[JsonFileHandler] Failed to remove ${tempPath}`, { error: cleanupError });
      }

      return false;
    }
  }

  private createBackup(): void {
    if (this.options.maxBackups === 0) {
      return;
    }
    try {
      const backupPath = `${this.filePath}.backup.${Date.now()}`;
      fs.copyFileSync(this.filePath, backupPath);
      this.cleanupOldBackups();
    } catch (error) {
      logger.warn(`[JsonFileHandler] Failed to create backup`, { error });
    }
  }

  private cleanupOldBackups(): void {
    try {
      const dir = path.dirname(this.filePath);
      const basename = path.basename(this.filePath);

      const backups = fs
        .readdirSync(dir)
        .filter(f => f.startsWith(`${basename}.backup.`))
        .map(f => ({
          path: path.join(dir, f),
          time: Number(f.slice(`${basename}.backup.`.length)) || 0,
        }))
        .sort((a, b) => b.time - a.time);

      for (const backup of backups.slice(this.options.maxBackups)) {
        fs.unlinkSync(backup.path);
      }
    } catch (error) {
      logger.warn(`[JsonFileHandler] Failed to cleanup backups`, { error });
    }
  }
}
