import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

export type MessageCatalog = {
  has: (key: string) => boolean;
  translate: (key: string, parameters?: Array<string>) => string;
};

const DEFAULT_MESSAGES_FILE = fileURLToPath(new URL("../messages/en.json", import.meta.url));

function parseMessages(input: unknown): Record<string, string> {
  if (!input || typeof input !== "object" || Array.isArray(input)) {
    return {};
  }

  return Object.fromEntries(
    Object.entries(input).filter((entry): entry is [string, string] => typeof entry[1] === "string")
  );
}

export function createMessageCatalog(messages: Record<string, string>): MessageCatalog {
  return {
    has: (key) => Object.hasOwn(messages, key),
    translate: (key, parameters = []) => {
      const template = Object.hasOwn(messages, key) ? messages[key] : undefined;
      if (template === undefined) {
        return parameters.length > 0 ? `${key} (${parameters.join(", ")})` : key;
      }
      return template.replace(/\{(\d+)\}/g, (placeholder, index: string) => parameters[Number(index)] ?? placeholder);
    }
  };
}

export function loadMessageCatalog(filePath: string = DEFAULT_MESSAGES_FILE): MessageCatalog {
  const raw = readFileSync(filePath, "utf8");
  return createMessageCatalog(parseMessages(JSON.parse(raw)));
}
