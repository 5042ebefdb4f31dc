import { Segment } from "../../src/quotes/types/Segment";

export function makeSegment(authorName: string, lines: string[]): Segment {
  return { authorName, bodyLines: lines, bodyText: lines.join("\n") };
}

export async function collect<T>(items: AsyncIterable<T> | Iterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of items) out.push(item);
  return out;
}

export function pageXml(title: string, text: string, ns = "0"): string {
  return `<page><title>${title}</title><ns>${ns}</ns><revision><text xml:space="preserve">${text}</text></revision></page>`;
}

export function exportXml(...pages: string[]): string {
  return `<mediawiki xmlns="http://www.mediawiki.org/xml/export-0.11/" version="0.11">\n<siteinfo><sitename>Wikiquote</sitename></siteinfo>\n${pages.join("\n")}\n</mediawiki>\n`;
}
