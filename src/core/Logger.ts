/**
 * Logger - Pub/Sub diagnostic events for the network library
 *
 * Parsers and services publish events (parse failed, supernet pass done,
 * split rejected, etc.). Subscribers can listen to all events or filter by
 * source, event prefix or level.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface NetworkLog {
  timestamp: number;
  level: LogLevel;
  source: string;        // component that emitted the event (e.g. "parser")
  event: string;          // event name (e.g. "parse:failed", "supernet:pass")
  message: string;        // human-readable description
  data?: Record<string, unknown>; // optional structured data
}

export type LogSubscriber = (log: NetworkLog) => void;

export interface LogFilter {
  source?: string;
  event?: string;
  level?: LogLevel;
}

export interface LoggerConfig {
  maxLogs?: number;
}

interface Subscription {
  id: number;
  subscriber: LogSubscriber;
  filter?: LogFilter;
}

const DEFAULT_MAX_LOGS = 10000;

class LoggerSingleton {
  private subscriptions: Subscription[] = [];
  private nextId = 1;
  private logs: NetworkLog[] = [];
  private maxLogs = DEFAULT_MAX_LOGS;

  /**
   * Publish a log event
   */
  log(level: LogLevel, source: string, event: string, message: string, data?: Record<string, unknown>): void {
    const entry: NetworkLog = {
      timestamp: Date.now(),
      level,
      source,
      event,
      message,
      data,
    };

    this.logs.push(entry);
    if (this.logs.length > this.maxLogs) {
      this.logs = this.logs.slice(-Math.floor(this.maxLogs / 2));
    }

    for (const sub of this.subscriptions) {
      if (sub.filter) {
        if (sub.filter.source && sub.filter.source !== source) continue;
        if (sub.filter.event && !event.startsWith(sub.filter.event)) continue;
        if (sub.filter.level && sub.filter.level !== level) continue;
      }
      sub.subscriber(entry);
    }
  }

  debug(source: string, event: string, message: string, data?: Record<string, unknown>): void {
    this.log('debug', source, event, message, data);
  }

  info(source: string, event: string, message: string, data?: Record<string, unknown>): void {
    this.log('info', source, event, message, data);
  }

  warn(source: string, event: string, message: string, data?: Record<string, unknown>): void {
    this.log('warn', source, event, message, data);
  }

  error(source: string, event: string, message: string, data?: Record<string, unknown>): void {
    this.log('error', source, event, message, data);
  }

  /**
   * Subscribe to log events with optional filter
   */
  subscribe(subscriber: LogSubscriber, filter?: LogFilter): number {
    const id = this.nextId++;
    this.subscriptions.push({ id, subscriber, filter });
    return id;
  }

  /**
   * Unsubscribe by subscription ID
   */
  unsubscribe(id: number): void {
    this.subscriptions = this.subscriptions.filter(s => s.id !== id);
  }

  /**
   * Change the size of the in-memory buffer
   */
  configure(config: LoggerConfig): void {
    if (config.maxLogs !== undefined) {
      if (!Number.isInteger(config.maxLogs) || config.maxLogs < 2) {
        throw new Error(`Invalid logger config: maxLogs must be an integer >= 2, got ${config.maxLogs}`);
      }
      this.maxLogs = config.maxLogs;
    }
  }

  getLogs(): NetworkLog[] {
    return [...this.logs];
  }

  getLogsBySource(source: string): NetworkLog[] {
    return this.logs.filter(l => l.source === source);
  }

  /**
   * Clear all logs and subscriptions, restore the default buffer size
   */
  reset(): void {
    this.logs = [];
    this.subscriptions = [];
    this.nextId = 1;
    this.maxLogs = DEFAULT_MAX_LOGS;
  }
}

export const Logger = new LoggerSingleton();
