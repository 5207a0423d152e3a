import { z } from 'zod';
import { ConsoleLogger, silentLogger } from './logger';
import { MiddlewarePipeline } from './MiddlewarePipeline';
import type { Sender } from './senders/Sender';
import { TransportSender } from './senders/TransportSender';
import type { Logger } from './types';

export type SenderFactory = () => Sender;

const DEFAULT_TIMEOUT_MS = 30_000;

const envSchema = z.object({
  COURIER_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('silent'),
  COURIER_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
});

export type CourierEnv = z.infer<typeof envSchema>;

/**
 * Parses the COURIER_* environment variables.
 *
 * @throws Error listing every invalid variable
 */
export function loadEnv(env: Record<string, string | undefined> = process.env): CourierEnv {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid courier environment: ${details}`);
  }
  return result.data;
}

/**
 * Process-wide defaults: the sender new connectors use, middleware applied
 * to every send, the logger and the default timeout.
 *
 * Connectors read the shared `Config` instance unless given their own with
 * `withGlobalConfig()`. Tests that touch the shared instance should call
 * `reset()` afterwards.
 */
export class GlobalConfig {
  private senderFactory?: SenderFactory;
  private globalMiddleware = new MiddlewarePipeline();
  private logger: Logger = silentLogger;
  private timeoutMs = DEFAULT_TIMEOUT_MS;

  setDefaultSender(factory: SenderFactory): this {
    this.senderFactory = factory;
    return this;
  }

  resetDefaultSender(): this {
    this.senderFactory = undefined;
    return this;
  }

  createDefaultSender(): Sender {
    if (this.senderFactory) {
      return this.senderFactory();
    }
    return new TransportSender({ timeoutMs: this.timeoutMs, logger: this.logger });
  }

  middleware(): MiddlewarePipeline {
    return this.globalMiddleware;
  }

  resetMiddleware(): this {
    this.globalMiddleware = new MiddlewarePipeline();
    return this;
  }

  setLogger(logger: Logger): this {
    this.logger = logger;
    return this;
  }

  getLogger(): Logger {
    return this.logger;
  }

  setDefaultTimeout(timeoutMs: number): this {
    this.timeoutMs = timeoutMs;
    return this;
  }

  get defaultTimeoutMs(): number {
    return this.timeoutMs;
  }

  configureFromEnv(env: Record<string, string | undefined> = process.env): this {
    const parsed = loadEnv(env);
    this.timeoutMs = parsed.COURIER_TIMEOUT_MS;
    this.logger = parsed.COURIER_LOG_LEVEL === 'silent' ? silentLogger : new ConsoleLogger(parsed.COURIER_LOG_LEVEL);
    return this;
  }

  reset(): this {
    this.senderFactory = undefined;
    this.globalMiddleware = new MiddlewarePipeline();
    this.logger = silentLogger;
    this.timeoutMs = DEFAULT_TIMEOUT_MS;
    return this;
  }
}

export const Config = new GlobalConfig();
