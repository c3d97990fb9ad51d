import { XMLBuilder, XMLParser, XMLValidator } from "fast-xml-parser";
import { isPlainObject, isString } from "es-toolkit";
import { z } from "zod";
import type { FeedChannel, FeedItem } from "./fun-half.types.js";

const ATTR_PREFIX = "@_";
const TEXT_NODE = "#text";
const ITEM_PATH = "rss.channel.item";
const XML_DECLARATION = '<?xml version="1.0" encoding="utf-8"?>\n';

export const XmlNamespaces = {
  Atom: "http://www.w3.org/2005/Atom",
} as const;

const XmlTags = {
  rss: "rss",
  channel: "channel",
  title: "title",
  link: "link",
  description: "description",
  atomLink: "atom:link",
  item: "item",
  guid: "guid",
  pubDate: "pubDate",
} as const;

const RFC822_ZONE_NAME = /^[A-Z]{2,5}$/;
const GMT_OFFSET = /^GMT([+-])(\d{2}):(\d{2})$/;

// A record keeps the channel's children in document order.
const rawNodeSchema = z.record(z.unknown());

const rawDocumentSchema = z
  .object({
    rss: z
      .object({
        channel: rawNodeSchema,
      })
      .passthrough(),
  })
  .passthrough();

export type RawFeedDocument = z.infer<typeof rawDocumentSchema>;
type RawNode = z.infer<typeof rawNodeSchema>;

export class FeedDocumentParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FeedDocumentParseError";
  }
}

/**
 * Parses an RSS document, keeping every element so it can be written back unchanged.
 * Throws `FeedDocumentParseError` when the XML is malformed or has no `rss > channel`.
 */
export function parseFeedDocument(xml: string): RawFeedDocument {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new FeedDocumentParseError(`Malformed XML at line ${validation.err.line}: ${validation.err.msg}`);
  }

  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: ATTR_PREFIX,
    ignoreDeclaration: true,
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: true,
    isArray: (_tagName, jPath) => jPath === ITEM_PATH,
  });

  const result = rawDocumentSchema.safeParse(parser.parse(xml));
  if (!result.success) {
    throw new FeedDocumentParseError("Document has no rss channel");
  }

  return result.data;
}

export function serializeFeedDocument(document: RawFeedDocument): string {
  const builder = new XMLBuilder({
    ignoreAttributes: false,
    attributeNamePrefix: ATTR_PREFIX,
    format: true,
    indentBy: "  ",
    suppressEmptyNode: true,
  });

  return XML_DECLARATION + builder.build(document);
}

export function createEmptyFeedDocument(channel: FeedChannel): RawFeedDocument {
  return {
    [XmlTags.rss]: {
      [`${ATTR_PREFIX}version`]: "2.0",
      [`${ATTR_PREFIX}xmlns:atom`]: XmlNamespaces.Atom,
      [XmlTags.channel]: {
        [XmlTags.title]: channel.title,
        [XmlTags.link]: channel.link,
        [XmlTags.description]: channel.description,
        [XmlTags.atomLink]: {
          [`${ATTR_PREFIX}href`]: channel.selfUrl,
          [`${ATTR_PREFIX}rel`]: "self",
          [`${ATTR_PREFIX}type`]: "application/rss+xml",
        },
      },
    },
  };
}

/**
 * Item identifiers in document order: the link, else the guid, else the legacy title.
 */
export function getItemIdentifiers(document: RawFeedDocument): string[] {
  const identifiers: string[] = [];
  for (const item of getItems(document.rss.channel)) {
    // Empty `<item/>` elements parse as strings and carry no identifier.
    if (!isPlainObject(item)) {
      continue;
    }

    const identifier = getText(item, XmlTags.link) || getText(item, XmlTags.guid) || getText(item, XmlTags.title);
    if (identifier) {
      identifiers.push(identifier);
    }
  }

  return identifiers;
}

/**
 * Returns a copy of the document with `item` placed before all existing items.
 * Other channel elements keep their position.
 */
export function prependItem(document: RawFeedDocument, item: FeedItem, timeZone: string): RawFeedDocument {
  const rawItem: RawNode = {
    [XmlTags.title]: item.title,
    [XmlTags.link]: item.link,
    [XmlTags.guid]: item.link,
    [XmlTags.pubDate]: formatPubDate(item.publishedAt, timeZone),
  };

  const channel = document.rss.channel;
  return {
    ...document,
    rss: {
      ...document.rss,
      channel: {
        ...channel,
        [XmlTags.item]: [rawItem, ...getItems(channel)],
      },
    },
  };
}

/**
 * RFC 822 date in the given time zone, e.g. `Mon, 05 Jan 2026 12:30:00 EST`.
 * Zones without a letter abbreviation get a numeric offset such as `+0100`.
 */
export function formatPubDate(date: Date, timeZone: string): string {
  const formatter = new Intl.DateTimeFormat("en-US", {
    timeZone,
    weekday: "short",
    day: "2-digit",
    month: "short",
    year: "numeric",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hourCycle: "h23",
    timeZoneName: "short",
  });

  const parts: Record<string, string> = {};
  for (const part of formatter.formatToParts(date)) {
    parts[part.type] = part.value;
  }

  const zone = RFC822_ZONE_NAME.test(parts.timeZoneName) ? parts.timeZoneName : formatOffset(date, timeZone);
  return `${parts.weekday}, ${parts.day} ${parts.month} ${parts.year} ${parts.hour}:${parts.minute}:${parts.second} ${zone}`;
}

function formatOffset(date: Date, timeZone: string): string {
  const offsetName = new Intl.DateTimeFormat("en-US", { timeZone, timeZoneName: "longOffset" })
    .formatToParts(date)
    .find((part) => part.type === "timeZoneName")?.value;

  // Zero offsets come out as a bare "GMT".
  const match = offsetName?.match(GMT_OFFSET);
  return match ? `${match[1]}${match[2]}${match[3]}` : "+0000";
}

function getItems(channel: RawNode): unknown[] {
  const items = channel[XmlTags.item];
  return Array.isArray(items) ? items : [];
}

function getText(item: RawNode, key: string): string | undefined {
  const value = item[key];
  if (isString(value)) {
    return value.trim() || undefined;
  }

  if (isPlainObject(value)) {
    const text = value[TEXT_NODE];
    return isString(text) ? text.trim() || undefined : undefined;
  }

  return undefined;
}
