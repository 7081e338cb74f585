import { IO_VERBOSITY, type ExtensionIo, type IoMessage, type IoVerbosity, type StewardLogger } from "@steward/sdk";
import type { MessageCatalog } from "./message-catalog.js";

export type IoEntry = {
  verbosity: IoVerbosity;
  key: string | null;
  parameters: Array<string>;
  text: string;
};

/**
 * Collects translated progress lines for one request so they can be returned to the caller.
 * Everything written is mirrored to the structured logger, including lines above the threshold.
 */
export class BufferedExtensionIo implements ExtensionIo {
  private readonly catalog: MessageCatalog;
  private readonly logger: StewardLogger | null;
  private readonly threshold: IoVerbosity;
  private readonly entries: Array<IoEntry> = [];

  constructor(input: { catalog: MessageCatalog; logger?: StewardLogger | null; verbosity?: IoVerbosity }) {
    this.catalog = input.catalog;
    this.logger = input.logger ?? null;
    this.threshold = input.verbosity ?? IO_VERBOSITY.normal;
  }

  public write(message: IoMessage, verbosity: IoVerbosity = IO_VERBOSITY.normal): void {
    const entry = this.toEntry(message, verbosity);

    if (this.logger) {
      const fields = { key: entry.key, parameters: entry.parameters, verbosity };
      if (verbosity >= IO_VERBOSITY.verbose) {
        this.logger.warn(fields, entry.text);
      } else {
        this.logger.debug(fields, entry.text);
      }
    }

    if (verbosity <= this.threshold) {
      this.entries.push(entry);
    }
  }

  public lines(): Array<IoEntry> {
    return [...this.entries];
  }

  public output(): Array<string> {
    return this.entries.map((entry) => entry.text);
  }

  private toEntry(message: IoMessage, verbosity: IoVerbosity): IoEntry {
    if (typeof message === "string") {
      return {
        verbosity,
        key: this.catalog.has(message) ? message : null,
        parameters: [],
        text: this.catalog.translate(message)
      };
    }

    return {
      verbosity,
      key: message.key,
      parameters: [...message.parameters],
      text: this.catalog.translate(message.key, message.parameters)
    };
  }
}

export class NullExtensionIo implements ExtensionIo {
  public write(): void {}
}

export const nullIo: ExtensionIo = new NullExtensionIo();
