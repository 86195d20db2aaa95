import path from "node:path";

import type { ChatgateConfigInput } from "../config/types.chatgate.js";
import { ChatgateSchema } from "../config/zod-schema.chatgate.js";
import { CONFIG_FILENAME, resolveChatgateConfig } from "./config.js";
import type { ChatgateConfig, Logger } from "./domain.js";
import { loadJsonFile } from "./json-file.js";

const RESTART_REQUIRED_KEYS = ["port", "bindAddress", "transport"] as const;

/**
 * Live configuration: defaults, then chatgate.json, then programmatic
 * overrides. `reload()` swaps in a new object; readers holding the old one
 * keep a consistent view.
 */
export class ChatgateConfigStore {
  private config: ChatgateConfig;
  readonly filePath: string;

  constructor(
    private readonly params: {
      statePath?: string;
      overrides?: ChatgateConfigInput;
      logger: Logger;
    },
  ) {
    this.config = resolveChatgateConfig(params.statePath, params.overrides);
    this.filePath = path.join(this.config.statePath, CONFIG_FILENAME);
  }

  current(): ChatgateConfig {
    return this.config;
  }

  async load(): Promise<ChatgateConfig> {
    const fileInput = await loadJsonFile(this.filePath, ChatgateSchema, {});
    this.config = resolveChatgateConfig(this.params.statePath, fileInput, this.params.overrides);
    return this.config;
  }

  /** Rejects and keeps the current config when the file is invalid. */
  async reload(): Promise<ChatgateConfig> {
    const previous = this.config;
    const next = await this.load();
    for (const key of RESTART_REQUIRED_KEYS) {
      if (previous[key] !== next[key]) {
        this.params.logger.warn(
          `Config "${key}" changed from ${String(previous[key])} to ${String(next[key])}; restart the server to apply it`,
        );
      }
    }
    this.params.logger.info(`Reloaded configuration from ${this.filePath}`);
    return next;
  }
}
