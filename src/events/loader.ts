import { readFile } from "node:fs/promises";

import { DOMParser, ParseError, type Document, type Element } from "@xmldom/xmldom";

import { SYSMON_EVENT_NAMESPACE } from "../constants.js";
import { MalformedInputError, NotFoundError, isNotFoundError } from "../errors.js";

export async function loadSysmonEvents(xmlPath: string): Promise<Element[]> {
  let content: string;
  try {
    content = await readFile(xmlPath, "utf8");
  } catch (error: unknown) {
    if (isNotFoundError(error)) {
      throw new NotFoundError(`Input file not found: ${xmlPath}`, { cause: error });
    }
    throw error;
  }

  const events = parseSysmonXml(content, xmlPath);
  console.log(`Loaded ${events.length} events from ${xmlPath}`);
  return events;
}

/**
 * Parses a Sysmon XML export and returns every `Event` element in the event
 * namespace, at any depth, in document order.
 */
export function parseSysmonXml(content: string, source = "<input>"): Element[] {
  const problems: string[] = [];
  const parser = new DOMParser({
    onError: (level, message) => {
      if (level !== "warning") {
        problems.push(message);
      }
    },
  });

  let doc: Document;
  try {
    doc = parser.parseFromString(content.replace(/^\uFEFF/, ""), "text/xml");
  } catch (error: unknown) {
    if (error instanceof ParseError) {
      throw new MalformedInputError(`Malformed XML in ${source}: ${error.message}`, { cause: error });
    }
    throw error;
  }

  if (problems.length > 0 || !doc.documentElement) {
    const detail = problems[0] ?? "document has no root element";
    throw new MalformedInputError(`Malformed XML in ${source}: ${detail}`);
  }

  const matches = doc.getElementsByTagNameNS(SYSMON_EVENT_NAMESPACE, "Event");
  const events: Element[] = [];
  for (let i = 0; i < matches.length; i += 1) {
    const event = matches.item(i);
    if (event) {
      events.push(event);
    }
  }
  return events;
}
