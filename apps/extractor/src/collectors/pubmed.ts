/**
 * PubMed abstracts via NCBI E-utilities: esearch (JSON) for ids, efetch (XML) for abstracts.
 * https://eutils.ncbi.nlm.nih.gov/entrez/eutils/
 */

import { XMLParser } from "fast-xml-parser";
import { z } from "zod";
import { fetchWithRetry } from "../fetchWithRetry.js";
import type { CollectedDocument, Collector } from "./types.js";

const EUTILS_BASE = "https://eutils.ncbi.nlm.nih.gov/entrez/eutils";

export interface PubmedArticle {
  pmid: string;
  title: string;
  abstract: string;
  journal: string | null;
  year: string | null;
}

export interface PubmedQuery {
  term: string;
  maxResults?: number;
}

export interface PubmedOptions {
  tool: string;
  email?: string;
  apiKey?: string;
}

const SearchSchema = z.object({
  esearchresult: z.object({ idlist: z.array(z.string()).default([]) }).optional(),
});

const parser = new XMLParser({
  ignoreAttributes: true,
  isArray: (name) => name === "PubmedArticle" || name === "AbstractText",
});

function child(node: unknown, key: string): unknown {
  if (typeof node !== "object" || node === null) return undefined;
  const value: unknown = Reflect.get(node, key);
  return value;
}

/** Flatten a parsed XML node (string, number, #text object or array of those) into text. */
export function textOf(node: unknown): string {
  if (typeof node === "string") return node.trim();
  if (typeof node === "number") return String(node);
  if (Array.isArray(node)) return node.map(textOf).filter(Boolean).join(" ");
  if (typeof node === "object" && node !== null) return textOf(child(node, "#text"));
  return "";
}

export function parseEfetchXml(xml: string): PubmedArticle[] {
  const doc: unknown = parser.parse(xml);
  const articles = child(child(doc, "PubmedArticleSet"), "PubmedArticle");
  if (!Array.isArray(articles)) return [];
  const out: PubmedArticle[] = [];
  for (const entry of articles) {
    const citation = child(entry, "MedlineCitation");
    const pmid = textOf(child(citation, "PMID"));
    const article = child(citation, "Article");
    const title = textOf(child(article, "ArticleTitle"));
    if (!pmid || !title) continue;
    const journal = child(article, "Journal");
    out.push({
      pmid,
      title,
      abstract: textOf(child(child(article, "Abstract"), "AbstractText")),
      journal: textOf(child(journal, "Title")) || null,
      year: textOf(child(child(child(journal, "JournalIssue"), "PubDate"), "Year")) || null,
    });
  }
  return out;
}

function identity(options: PubmedOptions): string {
  const params = new URLSearchParams({ tool: options.tool });
  if (options.email) params.set("email", options.email);
  if (options.apiKey) params.set("api_key", options.apiKey);
  return params.toString();
}

export async function collectArticles(
  { term, maxResults = 20 }: PubmedQuery,
  options: PubmedOptions
): Promise<PubmedArticle[]> {
  try {
    const searchUrl = `${EUTILS_BASE}/esearch.fcgi?db=pubmed&term=${encodeURIComponent(term)}&retmax=${maxResults}&retmode=json&${identity(options)}`;
    const searchRes = await fetchWithRetry(searchUrl, {}, { maxRetries: 2, initialMs: 600 });
    if (!searchRes.ok) {
      console.error(`[collect] pubmed esearch ${searchRes.status} for "${term}"`);
      return [];
    }
    const ids = SearchSchema.parse(await searchRes.json()).esearchresult?.idlist ?? [];
    if (ids.length === 0) return [];

    const fetchUrl = `${EUTILS_BASE}/efetch.fcgi?db=pubmed&id=${ids.join(",")}&retmode=xml&${identity(options)}`;
    const fetchRes = await fetchWithRetry(fetchUrl, {}, { maxRetries: 2, initialMs: 600 });
    if (!fetchRes.ok) {
      console.error(`[collect] pubmed efetch ${fetchRes.status} for "${term}"`);
      return [];
    }
    return parseEfetchXml(await fetchRes.text());
  } catch (err) {
    console.error(`[collect] pubmed failed for "${term}"`, err);
    return [];
  }
}

export function articleToDocument(article: PubmedArticle): CollectedDocument {
  return {
    source_url: `https://pubmed.ncbi.nlm.nih.gov/${article.pmid}/`,
    title: article.title,
    content: `${article.title}\n${article.abstract}`.trim(),
    source_type: "pubmed_abstract",
  };
}

/** Collector bound to one NCBI tool/email identity. */
export function pubmedCollector(options: PubmedOptions): Collector<PubmedQuery, PubmedArticle> {
  return {
    name: "pubmed",
    collect: (query) => collectArticles(query, options),
    parse: (article) => [articleToDocument(article)],
  };
}
