/**
 * Tesseract Adapter
 *
 * Local OCR through tesseract.js. A worker runs one job at a time, so each
 * language gets a scheduler that grows to one worker per concurrent call,
 * up to `workers`. Workers start lazily and are reused across images; call
 * terminate() when the document set is done.
 *
 * Language data is read from disk (see tesseract-data.ts), never fetched.
 */

import type { Scheduler, Worker } from 'tesseract.js';
import { ErrorHandler } from '../errors/error-handler.js';
import { clampConfidence, failedResult } from './adapter.js';
import type { AdapterKind, RecognitionAdapter, RecognitionResult, RecognizeOptions } from './adapter.js';
import { stageLanguageData } from './tesseract-data.js';

export const DEFAULT_TESSERACT_LANGUAGE = 'eng+chi_sim';
export const DEFAULT_TESSERACT_WORKERS = 4;

type TesseractModule = typeof import('tesseract.js');

interface WorkerSet {
  scheduler: Scheduler;
  /** Started or starting workers */
  workers: Promise<Worker>[];
  /** recognize() calls currently using this set */
  inFlight: number;
}

export interface TesseractAdapterOptions {
  /** Tesseract language string. Default: 'eng+chi_sim' */
  language?: string;
  /** Most workers per language; match the recognition pool size. Default: 4 */
  workers?: number;
  /** Directory language data is staged into. Default: ~/.docfusion/tessdata */
  dataDir?: string;
}

export class TesseractAdapter implements RecognitionAdapter {
  readonly engineId = 'tesseract';
  readonly kind: AdapterKind = 'ocr';
  private readonly language: string;
  private readonly maxWorkers: number;
  private readonly dataDir?: string;
  private library?: Promise<TesseractModule>;
  private readonly sets = new Map<string, WorkerSet>();

  constructor(options: TesseractAdapterOptions = {}) {
    this.language = options.language ?? DEFAULT_TESSERACT_LANGUAGE;
    this.maxWorkers = Math.max(1, options.workers ?? DEFAULT_TESSERACT_WORKERS);
    this.dataDir = options.dataDir;
  }

  isAvailable(): boolean {
    return true;
  }

  /** `options.language` selects (and if needed starts) workers for that language. */
  async recognize(image: Uint8Array, options?: RecognizeOptions): Promise<RecognitionResult> {
    const start = Date.now();
    const language = options?.language ?? this.language;

    const { data, error } = await ErrorHandler.wrap(async () => {
      const tesseract = await this.loadLibrary();
      const set = this.workerSet(tesseract, language);
      set.inFlight++;
      try {
        await this.ensureWorker(tesseract, set, language);
        // tesseract.js accepts Buffer but not a bare Uint8Array
        const result = await set.scheduler.addJob('recognize', Buffer.from(image));
        return result.data;
      } finally {
        set.inFlight--;
      }
    }, { engineId: this.engineId, language });

    const durationMs = Date.now() - start;
    if (error) {
      return failedResult(this.engineId, `Tesseract OCR failed: ${error.message}`, durationMs);
    }

    const text = data.text.trim();
    return {
      engineId: this.engineId,
      text,
      // Tesseract confidence is 0-100
      confidence: clampConfidence(data.confidence / 100),
      success: text.length > 0,
      error: text.length > 0 ? undefined : 'no text recognized',
      durationMs,
    };
  }

  async terminate(): Promise<void> {
    const sets = [...this.sets.values()];
    this.sets.clear();
    await Promise.all(
      sets.map(async (set) => {
        // Workers still starting are added to the scheduler once ready
        await Promise.allSettled(set.workers);
        await set.scheduler.terminate();
      })
    );
  }

  private loadLibrary(): Promise<TesseractModule> {
    if (!this.library) {
      // Dynamic import keeps tesseract.js off the load path when OCR is disabled
      this.library = import('tesseract.js');
    }
    return this.library;
  }

  private workerSet(tesseract: TesseractModule, language: string): WorkerSet {
    let set = this.sets.get(language);
    if (!set) {
      set = { scheduler: tesseract.createScheduler(), workers: [], inFlight: 0 };
      this.sets.set(language, set);
    }
    return set;
  }

  /**
   * Start another worker while there are fewer workers than calls, then
   * wait until one is ready to take the job.
   */
  private async ensureWorker(tesseract: TesseractModule, set: WorkerSet, language: string): Promise<void> {
    if (set.workers.length < Math.min(set.inFlight, this.maxWorkers)) {
      const starting = this.startWorker(tesseract, set.scheduler, language);
      set.workers.push(starting);
      // A failed start should not poison later calls
      starting.catch(() => {
        set.workers = set.workers.filter((worker) => worker !== starting);
      });
      await starting;
      return;
    }
    await Promise.race(set.workers);
  }

  private async startWorker(tesseract: TesseractModule, scheduler: Scheduler, language: string): Promise<Worker> {
    const langPath = stageLanguageData(language, this.dataDir);
    const worker = await tesseract.createWorker(language, tesseract.OEM.LSTM_ONLY, {
      langPath,
      cacheMethod: 'none',
      gzip: true,
    });
    scheduler.addWorker(worker);
    console.debug(`[docfusion:tesseract] worker started for '${language}'`, {
      workers: scheduler.getNumWorkers(),
    });
    return worker;
  }
}
