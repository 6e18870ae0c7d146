import { Logger } from '@nestjs/common';
import * as os from 'os';
import * as path from 'path';
import { OEM, createWorker } from 'tesseract.js';
import {
  OcrMatch,
  OpticalTextSource,
  ScoredOcrMatch,
  Screenshot,
  boundsFromBox,
  centerOf,
  errorMessage,
} from '@droidtap/shared';
import { similarityRatio } from './text-similarity';

export interface OcrBox {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

export interface OcrToken {
  text: string;
  confidence: number;
  bbox: OcrBox;
}

/**
 * The slice of a tesseract.js worker the detector relies on.
 */
export interface OcrWorker {
  recognize(image: Buffer): Promise<{ data: { words: OcrToken[]; lines: OcrToken[] } }>;
  terminate(): Promise<unknown>;
}

/**
 * Directory holding the trained data published as `@tesseract.js-data/<language>`
 * on npm, so the worker never fetches it from a CDN.
 */
export function bundledLangPath(language: string): string {
  const manifest = require.resolve(`@tesseract.js-data/${language}/package.json`);
  return path.join(path.dirname(manifest), '4.0.0_best_int');
}

export async function createBundledWorker(language: string): Promise<OcrWorker> {
  return createWorker(language, OEM.LSTM_ONLY, {
    langPath: bundledLangPath(language),
    gzip: true,
    cachePath: os.tmpdir(),
  });
}

export interface OcrDetectorOptions {
  enabled?: boolean;
  language?: string;
  /** Raw tesseract confidence (0-100) below which tokens are dropped */
  minTokenConfidence?: number;
  /** Match confidence (0-1) required by text searches */
  minMatchConfidence?: number;
  createWorker?: (language: string) => Promise<OcrWorker>;
}

export interface FindTextOptions {
  exact?: boolean;
  minConfidence?: number;
}

export class OCRDetector implements OpticalTextSource {
  private readonly logger = new Logger(OCRDetector.name);
  private readonly language: string;
  private readonly minTokenConfidence: number;
  private readonly minMatchConfidence: number;
  private readonly workerFactory: (language: string) => Promise<OcrWorker>;
  private worker: OcrWorker | null = null;
  private enabled: boolean;
  private lastScan: { image: Screenshot; matches: OcrMatch[] } | null = null;

  constructor(options: OcrDetectorOptions = {}) {
    this.enabled = options.enabled ?? true;
    this.language = options.language ?? 'eng';
    this.minTokenConfidence = options.minTokenConfidence ?? 30;
    this.minMatchConfidence = options.minMatchConfidence ?? 0.6;
    this.workerFactory = options.createWorker ?? createBundledWorker;
  }

  get available(): boolean {
    return this.enabled;
  }

  /**
   * Recognises every word, and every multi-word line, on the screenshot.
   * Results are kept for the most recent screenshot object.
   */
  async scan(image: Screenshot): Promise<OcrMatch[]> {
    if (this.lastScan && this.lastScan.image === image) {
      return this.lastScan.matches;
    }

    const worker = await this.getWorker();
    const { data } = await worker.recognize(image.bytes);
    const lines = data.lines.filter((line) => /\s/.test(line.text.trim()));

    const matches: OcrMatch[] = [];
    for (const token of [...data.words, ...lines]) {
      const match = this.toMatch(token);
      if (match) {
        matches.push(match);
      }
    }

    this.lastScan = { image, matches };
    this.logger.debug(`OCR recognised ${matches.length} text runs`);
    return matches;
  }

  async findText(
    image: Screenshot,
    query: string,
    options: FindTextOptions = {},
  ): Promise<OcrMatch[]> {
    const minConfidence = options.minConfidence ?? this.minMatchConfidence;
    const needle = query.toLowerCase();
    const matches = await this.scan(image);

    return matches
      .filter((match) => {
        if (match.confidence < minConfidence) {
          return false;
        }
        const haystack = match.text.toLowerCase();
        return options.exact ? haystack === needle : haystack.includes(needle);
      })
      .sort((a, b) => b.confidence - a.confidence);
  }

  async findTextFuzzy(
    image: Screenshot,
    query: string,
    threshold = 0.7,
  ): Promise<ScoredOcrMatch[]> {
    const needle = query.toLowerCase();
    const matches = await this.scan(image);
    const scored: ScoredOcrMatch[] = [];

    for (const match of matches) {
      if (match.confidence < this.minMatchConfidence) {
        continue;
      }
      const score = similarityRatio(needle, match.text.toLowerCase());
      if (score >= threshold) {
        scored.push({ score, match });
      }
    }

    return scored.sort((a, b) => b.score - a.score);
  }

  async cleanup(): Promise<void> {
    if (this.worker) {
      await this.worker.terminate();
      this.worker = null;
    }
    this.lastScan = null;
  }

  private async getWorker(): Promise<OcrWorker> {
    if (!this.worker) {
      try {
        this.worker = await this.workerFactory(this.language);
      } catch (error) {
        this.enabled = false;
        this.logger.error(
          `OCR worker could not start, disabling OCR: ${errorMessage(error)}`,
        );
        throw error;
      }
    }
    return this.worker;
  }

  private toMatch(token: OcrToken): OcrMatch | null {
    const text = token.text.replace(/\s+/g, ' ').trim();
    if (!text || token.confidence < this.minTokenConfidence) {
      return null;
    }

    const bounds = boundsFromBox(
      token.bbox.x0,
      token.bbox.y0,
      Math.max(1, token.bbox.x1 - token.bbox.x0),
      Math.max(1, token.bbox.y1 - token.bbox.y0),
    );

    return Object.freeze({
      text,
      confidence: Math.min(Math.max(token.confidence / 100, 0), 1),
      bounds,
      center: centerOf(bounds),
    });
  }
}
