import { JSDOM } from 'jsdom';
import type { FeedSubscription } from '../models/feed.js';
import { FeedstashError, errorMessage } from '../utils/errors.js';

type XmlDocument = JSDOM['window']['document'];
type XmlElement = XmlDocument['documentElement'];

export class OpmlParseError extends FeedstashError {
  constructor(message: string) {
    super(`Invalid OPML: ${message}`, 'OPML_INVALID');
    this.name = 'OpmlParseError';
  }
}

// XML 属性大小写敏感，但常见导出工具会写成 xmlurl / XMLURL
function attribute(element: Pick<XmlElement, 'attributes'>, name: string): string | null {
  const wanted = name.toLowerCase();
  for (const attr of Array.from(element.attributes)) {
    if (attr.name.toLowerCase() === wanted) {
      return attr.value;
    }
  }
  return null;
}

/** Every outline carrying an xmlUrl, nested ones included, first occurrence of each URL wins. */
export function parseOpml(xml: string): FeedSubscription[] {
  let document: XmlDocument;
  try {
    document = new JSDOM(xml, { contentType: 'text/xml' }).window.document;
  } catch (error) {
    throw new OpmlParseError(errorMessage(error));
  }

  if (document.documentElement.nodeName.toLowerCase() !== 'opml') {
    throw new OpmlParseError(`root element is <${document.documentElement.nodeName}>`);
  }

  const seen = new Set<string>();
  const feeds: FeedSubscription[] = [];

  for (const outline of Array.from(document.getElementsByTagName('outline'))) {
    const url = attribute(outline, 'xmlUrl')?.trim();
    if (!url || seen.has(url)) continue;
    seen.add(url);

    const title = attribute(outline, 'title')?.trim() || attribute(outline, 'text')?.trim() || url;
    feeds.push({ url, title });
  }

  return feeds;
}

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

export function exportOpml(feeds: FeedSubscription[], title = 'feedstash subscriptions', now = new Date()): string {
  const outlines = feeds.map(feed => {
    const name = escapeXml(feed.title);
    return `    <outline type="rss" text="${name}" title="${name}" xmlUrl="${escapeXml(feed.url)}"/>`;
  });

  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<opml version="2.0">',
    '  <head>',
    `    <title>${escapeXml(title)}</title>`,
    `    <dateCreated>${now.toUTCString()}</dateCreated>`,
    '  </head>',
    '  <body>',
    ...outlines,
    '  </body>',
    '</opml>',
    '',
  ].join('\n');
}
