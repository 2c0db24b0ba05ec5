/**
 * Raw event as returned by a scraper before validation.
 * One record per (source, occurrence); dates are instants computed from the
 * source's wall-clock time in the catalog's timezone.
 */
export interface RawEvent {
  title: string;
  dateStart: Date | null;
  dateEnd?: Date | null;
  description?: string;
  location?: string;
  category?: string;
  imageUrl?: string;
  price?: string;
  /** Defaults to the catalog's municipality. */
  city?: string;
  source: string;
  url?: string;
  tags?: string[];
}

/** A validated record, every optional field filled with its default. */
export interface EventRecord {
  title: string;
  dateStart: Date;
  dateEnd: Date | null;
  description: string;
  location: string;
  category: string;
  imageUrl: string;
  price: string;
  city: string;
  source: string;
  url: string;
  tags: string[];
}

/** One fetched page. */
export interface SourceDocument {
  url: string;
  html: string;
}

/** Run-wide values handed to every parse call. */
export interface ParseContext {
  /** Reference instant for year inference and past-event cutoffs. */
  now: Date;
  timeZone: string;
  city: string;
}

export interface PageFetcher {
  fetchHtml(url: string): Promise<string>;
}

export interface Scraper {
  id: string;
  name: string;
  baseUrl: string;
  /** Fetch every page the source needs (listings, archives, articles). */
  fetch(client: PageFetcher): Promise<SourceDocument[]>;
  /** Parse one page into raw events (pure). */
  parse(doc: SourceDocument, context: ParseContext): RawEvent[];
  /** Keep only the first (title, day) across all pages of a run. */
  dedupeAcrossDocuments?: boolean;
}
