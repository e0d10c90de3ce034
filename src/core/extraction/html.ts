/**
 * Parsed HTML document shared by every HTML strategy
 */

import { load as loadHtml, type CheerioAPI } from "cheerio";

export interface HtmlDocument {
  html: string;
  $: CheerioAPI;
  url: string;
}

export function parseHtmlDocument(html: string, url: string): HtmlDocument {
  return { html, $: loadHtml(html), url };
}

/** JSON inside the first script matching `selector`; undefined when absent or unparsable */
export function readScriptJson(doc: HtmlDocument, selector: string): unknown {
  const text = doc.$(selector).first().text();
  if (!text.trim()) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
