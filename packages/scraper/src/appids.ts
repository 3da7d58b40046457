import { readFile } from "node:fs/promises";
import { InvalidAppIdError } from "./errors.js";
import { logWarn } from "./logger.js";

export interface ParsedAppIds {
  appids: number[];
  /** Tokens that were not usable app IDs, in input order. */
  ignored: string[];
}

const DIGITS = /^\d+$/;

/** A positive integer that survives the round trip through `Number`. */
function toAppId(token: string): number | null {
  if (!DIGITS.test(token)) return null;
  const appid = Number(token);
  return Number.isSafeInteger(appid) && appid > 0 ? appid : null;
}

/**
 * Reads app IDs from free-form text: comma, whitespace or newline separated,
 * in any mix, with trailing commas allowed.
 */
export function parseAppIds(text: string): ParsedAppIds {
  const appids: number[] = [];
  const ignored: string[] = [];

  for (const token of text.replace(/,/g, " ").split(/\s+/)) {
    if (!token) continue;
    const appid = toAppId(token);
    if (appid === null) {
      ignored.push(token);
    } else {
      appids.push(appid);
    }
  }

  return { appids, ignored };
}

export async function loadAppIdsFromFile(path: string): Promise<number[]> {
  const { appids, ignored } = parseAppIds(await readFile(path, "utf-8"));
  for (const token of ignored) {
    logWarn("appid-token-ignored", { path, token });
  }
  return appids;
}

/** Strict variant for command-line arguments: any bad token is an error. */
export function parseAppIdArgs(args: readonly string[]): number[] {
  return args.map((arg) => {
    const token = arg.trim();
    const appid = toAppId(token);
    if (appid === null) throw new InvalidAppIdError(arg);
    return appid;
  });
}
