import type {
  ExtractionResult,
  ExtractorConfig,
  ExtractorEvent,
  ExtractorEventData,
  IScoreboardExtractor,
  Logger,
  RawDetection,
  TeamExtraction,
} from './types';
import { resolveExtractorConfig } from './config';
import { consoleLogger } from './logger';
import { extractScoreboard, mergeTeamResults } from './pipeline';

type HandlerFn<E extends ExtractorEvent> = (data: ExtractorEventData[E]) => void;

/**
 * A configured pipeline with lifecycle events. Holds no per-extraction
 * state: each `extract` call is independent.
 */
export class ScoreboardExtractor implements IScoreboardExtractor {
  private readonly config: ExtractorConfig;
  private readonly log: Logger;
  private listeners = new Map<ExtractorEvent, Set<HandlerFn<ExtractorEvent>>>();

  /**
   * @throws Error when `config` fails validation
   */
  constructor(config: Partial<ExtractorConfig> = {}, log: Logger = consoleLogger) {
    this.config = resolveExtractorConfig(config);
    this.log = log;
  }

  getConfig(): ExtractorConfig {
    return { ...this.config };
  }

  extract(raw: readonly RawDetection[]): ExtractionResult {
    this.emit('extraction:started', { detectionCount: raw.length });
    const startTime = performance.now();

    const result = extractScoreboard(raw, { config: this.config, log: this.log });
    const duration = performance.now() - startTime;

    if (result.success) {
      for (const diagnostic of result.skipped) {
        this.emit('row:rejected', diagnostic);
      }
      this.emit('extraction:completed', {
        recordCount: result.records.length,
        skippedCount: result.skipped.length,
        stats: result.stats,
        duration,
      });
    } else {
      if (result.error === 'no-valid-rows') {
        for (const diagnostic of result.diagnostics) {
          this.emit('row:rejected', diagnostic);
        }
      }
      this.emit('extraction:failed', {
        error: result.error,
        message: result.message,
        stats: result.stats,
        duration,
      });
    }

    return result;
  }

  extractTeam(images: readonly (readonly RawDetection[])[]): TeamExtraction {
    return mergeTeamResults(images.map((raw) => this.extract(raw)));
  }

  on<E extends ExtractorEvent>(
    event: E,
    handler: (data: ExtractorEventData[E]) => void
  ): () => void {
    let handlers = this.listeners.get(event);
    if (!handlers) {
      handlers = new Set();
      this.listeners.set(event, handlers);
    }
    handlers.add(handler as HandlerFn<ExtractorEvent>);

    return () => {
      this.listeners.get(event)?.delete(handler as HandlerFn<ExtractorEvent>);
    };
  }

  clear(): void {
    this.listeners.clear();
  }

  private emit<E extends ExtractorEvent>(event: E, data: ExtractorEventData[E]): void {
    const handlers = this.listeners.get(event);
    if (!handlers) return;

    for (const handler of handlers) {
      try {
        handler(data);
      } catch (e) {
        this.log('error', `Error in event handler for ${event}: ${e instanceof Error ? e.message : String(e)}`);
      }
    }
  }
}
