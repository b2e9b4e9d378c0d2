/**
 * Collectors fetch raw records from a source and turn them into documents for the store.
 * The extraction pipeline only ever sees documents, never a concrete collector.
 */

export interface CollectedDocument {
  source_url: string;
  title: string | null;
  content: string;
  source_type: string;
}

export interface Collector<Params, Raw> {
  readonly name: string;
  collect(params: Params): Promise<Raw[]>;
  parse(raw: Raw): CollectedDocument[];
}

/** collect + parse; a record that fails to parse is logged and dropped. */
export async function runCollector<Params, Raw>(
  collector: Collector<Params, Raw>,
  params: Params
): Promise<CollectedDocument[]> {
  const raws = await collector.collect(params);
  const docs: CollectedDocument[] = [];
  for (const raw of raws) {
    try {
      docs.push(...collector.parse(raw));
    } catch (err) {
      console.error(`[collect] ${collector.name}: failed to parse record`, err);
    }
  }
  return docs.filter((d) => d.content.trim().length > 0);
}
