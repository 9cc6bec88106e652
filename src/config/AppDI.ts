import type { Hono } from "hono";
import { err, ok, type Result } from "neverthrow";
import type { SentimentUseCase } from "../application/ports/in/SentimentUseCase.ts";
import { SentimentService } from "../application/services/SentimentService.ts";
import { createApp } from "../adapters/in/http/app.ts";
import { SentimentController } from "../adapters/in/http/SentimentController.ts";
import type { AdapterContainer } from "./adapters.ts";
import { debug } from "./logger.ts";

export type DIError = {
  type: "not_initialized" | "already_initialized";
  message: string;
};

export interface AppDIOptions {
  readonly requestTimeoutMs: number;
}

/**
 * Dependency injection container.
 * Services are built lazily on first use and then reused.
 */
export class AppDI {
  private adapters?: AdapterContainer;
  private options?: AppDIOptions;
  private sentimentService?: SentimentUseCase;
  private sentimentController?: SentimentController;
  private app?: Hono;

  initialize(adapters: AdapterContainer, options: AppDIOptions): Result<this, DIError> {
    if (this.adapters) {
      return err({
        type: "already_initialized",
        message: "DI container is already initialized",
      });
    }

    this.adapters = adapters;
    this.options = options;
    return ok(this);
  }

  getSentimentService(): Result<SentimentUseCase, DIError> {
    if (!this.adapters || !this.options) {
      return err({
        type: "not_initialized",
        message: "DI container not initialized. Call initialize() first.",
      });
    }

    if (!this.sentimentService) {
      this.sentimentService = new SentimentService(
        this.adapters.provider,
        this.adapters.cacheRepository,
        { requestTimeoutMs: this.options.requestTimeoutMs },
      );
    }

    return ok(this.sentimentService);
  }

  getSentimentController(): Result<SentimentController, DIError> {
    const serviceResult = this.getSentimentService();
    if (serviceResult.isErr()) {
      return err(serviceResult.error);
    }

    if (!this.sentimentController) {
      this.sentimentController = new SentimentController(serviceResult.value);
    }
    return ok(this.sentimentController);
  }

  getApp(): Result<Hono, DIError> {
    const controllerResult = this.getSentimentController();
    if (controllerResult.isErr()) {
      return err(controllerResult.error);
    }

    if (!this.app) {
      this.app = createApp(controllerResult.value);
    }
    return ok(this.app);
  }

  /**
   * Closes the provider client and logs final cache statistics
   */
  shutdown(): void {
    if (!this.adapters) return;

    this.adapters.provider.close();
    debug("Cache statistics at shutdown", { ...this.adapters.cache.stats() });
  }
}

// Singleton instance of the DI container
export const appDI = new AppDI();
