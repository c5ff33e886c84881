import type { Element, Node } from "@xmldom/xmldom";

import { SYSMON_EVENT_NAMESPACE } from "../constants.js";
import type { EventRecord } from "../types.js";
import { describeEventId } from "./descriptions.js";

const DATA_FIELDS: ReadonlySet<string> = new Set(["UtcTime", "Image", "ProcessId"]);

export function parseEvent(event: Element): EventRecord {
  const system = findChild(event, "System");
  const eventData = findChild(event, "EventData");

  const eventId = system ? readText(findChild(system, "EventID")) : null;
  const computer = system ? readText(findChild(system, "Computer")) : null;

  const data = new Map<string, string | null>();
  if (eventData) {
    for (const entry of findChildren(eventData, "Data")) {
      const name = entry.getAttribute("Name");
      if (name && DATA_FIELDS.has(name)) {
        data.set(name, readText(entry));
      }
    }
  }

  return {
    event_id: eventId,
    description: describeEventId(eventId),
    utc_time: data.get("UtcTime") ?? null,
    image: data.get("Image") ?? null,
    process_id: data.get("ProcessId") ?? null,
    computer,
  };
}

export function parseEvents(events: Iterable<Element>): EventRecord[] {
  return Array.from(events, parseEvent);
}

function findChild(parent: Element, localName: string): Element | null {
  for (const child of findChildren(parent, localName)) {
    return child;
  }
  return null;
}

function* findChildren(parent: Element, localName: string): Generator<Element> {
  const nodes = parent.childNodes;
  for (let i = 0; i < nodes.length; i += 1) {
    const node = nodes.item(i);
    if (isElement(node) && node.namespaceURI === SYSMON_EVENT_NAMESPACE && node.localName === localName) {
      yield node;
    }
  }
}

function isElement(node: Node | null): node is Element {
  return node !== null && node.nodeType === 1;
}

// Empty elements carry no value, same as missing ones.
function readText(element: Element | null): string | null {
  const text = element?.textContent;
  return text ? text : null;
}
