/**
 * Font registry backed by opentype.js
 *
 * Built once at startup from a directory of font files and never mutated
 * afterwards, so concurrent lookups from every worker need no locking. Any
 * unreadable directory or unparsable font aborts startup: there is no
 * partial registry.
 */

import { promises as fs } from 'fs';
import path from 'path';
import * as opentype from 'opentype.js';
import type { Logger } from 'pino';
import { FontLoadError, FontNotFoundError, errorMessage } from '../../core/image/errors';
import type { Font, FontProvider } from '../../core/image/ports';
import { createLogger } from '../../utils/logger';
import { layoutText } from './layout';

const FONT_PATTERN = /\.(ttf|otf|woff)$/i;

/** Laid out once per font at load; a layout failure fails the load */
const SAMPLE_TEXT = 'Blue Bird 0123456789 fi ffl';

function toArrayBuffer(buffer: Buffer): ArrayBuffer {
  const copy = new ArrayBuffer(buffer.byteLength);
  new Uint8Array(copy).set(buffer);
  return copy;
}

/** Font id is the lower-cased file name without its extension */
export function fontIdFromFile(fileName: string): string {
  return path.basename(fileName, path.extname(fileName)).toLowerCase();
}

export function parseFont(id: string, filePath: string, data: Buffer): Font {
  const outlines = opentype.parse(toArrayBuffer(data));

  if (!outlines.unitsPerEm || outlines.unitsPerEm <= 0) {
    throw new Error('missing or invalid unitsPerEm');
  }
  if (outlines.glyphs.length === 0) {
    throw new Error('font has no glyphs');
  }

  const family = outlines.names.fontFamily?.en ?? id;

  const font: Font = Object.freeze({
    id,
    family,
    path: filePath,
    unitsPerEm: outlines.unitsPerEm,
    ascender: outlines.ascender,
    descender: outlines.descender,
    outlines,
  });

  layoutText(font, SAMPLE_TEXT, 16, 0, 0);
  return font;
}

function normalizeId(id: string): string {
  return id.trim().toLowerCase();
}

export class FontRegistry implements FontProvider {
  private constructor(private readonly fonts: ReadonlyMap<string, Font>) {
    Object.freeze(this);
  }

  static fromFonts(fonts: Iterable<Font>): FontRegistry {
    const table = new Map<string, Font>();
    for (const font of fonts) {
      if (table.has(font.id)) {
        throw new FontLoadError(`Duplicate font id: ${font.id}`, { id: font.id });
      }
      table.set(font.id, font);
    }
    return new FontRegistry(table);
  }

  static async load(directory: string, logger: Logger = createLogger('fonts')): Promise<FontRegistry> {
    const root = path.resolve(directory);

    let entries: string[];
    try {
      const dirents = await fs.readdir(root, { withFileTypes: true });
      entries = dirents
        .filter((entry) => entry.isFile() && FONT_PATTERN.test(entry.name))
        .map((entry) => entry.name)
        .sort();
    } catch (error) {
      throw new FontLoadError(`Font directory is not readable: ${root}`, {
        directory: root,
        reason: errorMessage(error),
      });
    }

    if (entries.length === 0) {
      throw new FontLoadError(`No font files found in ${root}`, { directory: root });
    }

    const fonts: Font[] = [];
    for (const fileName of entries) {
      const filePath = path.join(root, fileName);
      try {
        const data = await fs.readFile(filePath);
        fonts.push(parseFont(fontIdFromFile(fileName), filePath, data));
      } catch (error) {
        throw new FontLoadError(`Failed to load font ${fileName}`, {
          file: filePath,
          reason: errorMessage(error),
        });
      }
    }

    const registry = FontRegistry.fromFonts(fonts);
    logger.info({ directory: root, fonts: registry.ids() }, 'Font registry loaded');
    return registry;
  }

  /** Ids are matched case-insensitively, the same way they are derived from file names */
  lookup(id: string): Font {
    const font = this.fonts.get(normalizeId(id));
    if (!font) {
      throw new FontNotFoundError(id);
    }
    return font;
  }

  ids(): string[] {
    return [...this.fonts.keys()];
  }
}
