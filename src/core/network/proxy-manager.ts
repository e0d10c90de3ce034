/**
 * Proxy pool with failure-triggered rotation
 */

import { readFileSync } from "node:fs";
import type { ProxyConfig, RotationStrategy } from "../types/config";
import { envList } from "../config/env";
import type { Logger } from "../utils/logger";
import { errorMeta } from "../utils/logger";
import { maskCredentials } from "../utils/url";

export interface ProxyEndpoints {
  http: string;
  https: string;
}

export interface ProxyStatus {
  enabled: boolean;
  total: number;
  currentIndex: number;
  current: string | null; // credentials masked
  failures: number;
  strategy: RotationStrategy;
}

export interface ProxyManagerOptions {
  logger: Logger;
  env?: NodeJS.ProcessEnv;
  random?: () => number;
}

export class ProxyManager {
  private readonly proxies: string[];
  private readonly failures: number[];
  private readonly logger: Logger;
  private readonly random: () => number;
  private index = 0;
  private readonly enabled: boolean;

  constructor(
    private readonly config: ProxyConfig,
    options: ProxyManagerOptions,
  ) {
    this.logger = options.logger.child({ component: "proxy-manager" });
    this.random = options.random ?? Math.random;
    this.proxies = config.enabled ? this.load(options.env ?? process.env) : [];
    this.failures = this.proxies.map(() => 0);
    this.enabled = config.enabled && this.proxies.length > 0;

    if (config.enabled && !this.enabled) {
      this.logger.warn({ source: config.source }, "Proxy rotation enabled but no proxies loaded; disabling");
    } else if (this.enabled) {
      this.logger.info(
        { count: this.proxies.length, source: config.source, strategy: config.rotationStrategy },
        "Proxies loaded",
      );
    }
  }

  private load(env: NodeJS.ProcessEnv): string[] {
    switch (this.config.source) {
      case "env":
        return envList(this.config.envVar, env);
      case "file": {
        if (!this.config.filePath) return [];
        try {
          return readFileSync(this.config.filePath, "utf8")
            .split(/\r?\n/)
            .map((line) => line.trim())
            .filter((line) => line && !line.startsWith("#"));
        } catch (error) {
          this.logger.error(errorMeta(error, { file: this.config.filePath }), "Could not read proxy file");
          return [];
        }
      }
      case "list":
        return this.config.proxies.map((p) => p.trim()).filter(Boolean);
    }
  }

  get isEnabled(): boolean {
    return this.enabled;
  }

  get size(): number {
    return this.proxies.length;
  }

  getProxyUrl(): string | null {
    return this.enabled ? this.proxies[this.index] : null;
  }

  /** Same endpoint for both schemes, or null when disabled */
  getProxy(): ProxyEndpoints | null {
    const url = this.getProxyUrl();
    return url ? { http: url, https: url } : null;
  }

  /** Advances round-robin, or jumps to a random other entry */
  rotate(): string | null {
    if (!this.enabled) return null;
    const n = this.proxies.length;
    if (n > 1) {
      if (this.config.rotationStrategy === "random") {
        const offset = 1 + Math.floor(this.random() * (n - 1));
        this.index = (this.index + offset) % n;
      } else {
        this.index = (this.index + 1) % n;
      }
    }
    const current = this.proxies[this.index];
    this.logger.info({ index: this.index, proxy: maskCredentials(current) }, "Rotated proxy");
    return current;
  }

  reportFailure(): void {
    if (!this.enabled) return;
    const count = ++this.failures[this.index];
    this.logger.warn({ index: this.index, failures: count }, "Proxy failure");
    if (count >= this.config.maxFailuresBeforeRotate) {
      this.rotate();
      this.failures[this.index] = 0;
    }
  }

  reportSuccess(): void {
    if (this.enabled) this.failures[this.index] = 0;
  }

  getStatus(): ProxyStatus {
    const current = this.getProxyUrl();
    return {
      enabled: this.enabled,
      total: this.proxies.length,
      currentIndex: this.index,
      current: current ? maskCredentials(current) : null,
      failures: this.enabled ? this.failures[this.index] : 0,
      strategy: this.config.rotationStrategy,
    };
  }
}
