/**
 * Company website pages (about, pipeline, products). Visible text only; scripts, styles and nav are dropped.
 */

import * as cheerio from "cheerio";
import { fetchWithRetry } from "../fetchWithRetry.js";
import type { CollectedDocument, Collector } from "./types.js";

export interface CompanyPageRequest {
  company: string;
  urls: string[];
}

export interface CompanyPage {
  company: string;
  url: string;
  html: string;
}

const USER_AGENT = "pipelinescope/0.1 (research crawler)";

export function pageSourceType(url: string): string {
  const path = url.toLowerCase();
  if (path.includes("pipeline")) return "company_pipeline";
  if (path.includes("oncology")) return "company_oncology";
  if (path.includes("product")) return "company_products";
  return "company_about";
}

export function htmlToText(html: string): { title: string | null; text: string } {
  const $ = cheerio.load(html);
  $("script, style, noscript, nav, footer, header").remove();
  const title = $("title").first().text().trim() || null;
  const main = $("main").length > 0 ? $("main") : $("body");
  const blocks: string[] = [];
  main.find("h1, h2, h3, h4, p, li, td").each((_, el) => {
    const t = $(el).text().replace(/\s+/g, " ").trim();
    if (t) blocks.push(t);
  });
  const text = blocks.length > 0 ? blocks.join("\n") : main.text().replace(/\s+/g, " ").trim();
  return { title, text };
}

export async function collectPages({ company, urls }: CompanyPageRequest): Promise<CompanyPage[]> {
  const pages: CompanyPage[] = [];
  for (const url of urls) {
    try {
      const res = await fetchWithRetry(url, { headers: { "User-Agent": USER_AGENT } }, { maxRetries: 1, initialMs: 1000 });
      if (!res.ok) {
        console.error(`[collect] ${company}: ${url} returned ${res.status}`);
        continue;
      }
      pages.push({ company, url, html: await res.text() });
    } catch (err) {
      console.error(`[collect] ${company}: ${url} failed`, err);
    }
  }
  return pages;
}

export function parsePage(page: CompanyPage): CollectedDocument[] {
  const { title, text } = htmlToText(page.html);
  return [
    {
      source_url: page.url,
      title: title ?? `${page.company} ${pageSourceType(page.url).replace("company_", "")}`,
      content: text,
      source_type: pageSourceType(page.url),
    },
  ];
}

export const websiteCollector: Collector<CompanyPageRequest, CompanyPage> = {
  name: "company-website",
  collect: collectPages,
  parse: parsePage,
};
