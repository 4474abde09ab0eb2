/**
 * Template Store
 *
 * Resolves template ids (file names such as "btn_play.png") against the
 * images directory, decodes them to grayscale and caches the result.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { TemplateLoadError } from '../../types/errors';
import type { Raster, TemplateLoader } from '../../types/navigation';
import { decodePngToGray } from '../../utils/raster';
import { createServiceLogger, type ServiceLogger } from '../logger';

export class TemplateStore implements TemplateLoader {
  private readonly imagesDir: string;
  private readonly cache = new Map<string, Raster>();
  private readonly logger: ServiceLogger;

  constructor(imagesDir: string, logger: ServiceLogger = createServiceLogger('template-store')) {
    this.imagesDir = path.resolve(imagesDir);
    this.logger = logger;
  }

  resolvePath(templateId: string): string {
    return path.resolve(this.imagesDir, templateId);
  }

  async loadTemplate(templateId: string): Promise<Raster> {
    const cached = this.cache.get(templateId);
    if (cached) {
      return cached;
    }

    const filePath = this.resolvePath(templateId);
    let buffer: Buffer;
    try {
      buffer = await fs.readFile(filePath);
    } catch (error) {
      throw new TemplateLoadError(templateId, filePath, error instanceof Error ? error.message : String(error));
    }

    let raster: Raster;
    try {
      raster = decodePngToGray(buffer);
    } catch (error) {
      throw new TemplateLoadError(templateId, filePath, `not a valid PNG (${error instanceof Error ? error.message : String(error)})`);
    }

    this.cache.set(templateId, raster);
    this.logger.debug('template_loaded', `Loaded template ${templateId}`, undefined, {
      templateId,
      width: raster.width,
      height: raster.height
    });
    return raster;
  }

  get cachedCount(): number {
    return this.cache.size;
  }

  clearCache(): void {
    this.cache.clear();
  }
}

/**
 * List every expected template that has no file in the images directory.
 * Duplicates are reported once, in first-seen order.
 */
export async function findMissingTemplates(
  states: Iterable<{ getExpectedImages(): string[] }>,
  imagesDir: string
): Promise<string[]> {
  const seen = new Set<string>();
  const missing: string[] = [];

  for (const state of states) {
    for (const templateId of state.getExpectedImages()) {
      if (seen.has(templateId)) {
        continue;
      }
      seen.add(templateId);
      try {
        await fs.access(path.resolve(imagesDir, templateId));
      } catch {
        missing.push(templateId);
      }
    }
  }

  return missing;
}
