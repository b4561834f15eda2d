export type SourceKind = 'wikipedia' | 'ballotpedia';

export type KnownOffice = 'PRESIDENT' | 'SENATE' | 'GOVERNOR' | 'HOUSE';
// Other offices are accepted and only get the generic page titles
export type Office = KnownOffice | (string & {});

export interface SourceHint {
  title?: string | undefined;
  url?: string | undefined;
}

export interface Target {
  id?: string | undefined;
  cycle: number;
  office: Office;
  state: string;
  district?: string | undefined;
  wikipedia?: SourceHint | undefined;
  ballotpedia?: SourceHint | undefined;
}

export interface Candidate {
  name: string;
  party?: string;
  website?: string;
  contact: Record<string, string>;
}

export interface Race {
  id: string;
  cycle: number;
  office: Office;
  state: string;
  district?: string;
  title?: string;
  primaryDate?: string;
  electionDate?: string;
  candidates: Candidate[];
  sources: Partial<Record<SourceKind, string>>;
  researchLinks: string[];
}

export interface RaceOutcome {
  raceId: string;
  race: Race;
  notes: string[];
  errors: string[];
}

// Fields one page yields, before they are merged into a Race
export interface PageExtraction {
  title?: string;
  primaryDate?: string;
  electionDate?: string;
  candidates: Candidate[];
  researchLinks: string[];
  notes: string[];
}

export interface ScrapeOptions {
  delaySeconds?: number;
  maxPages?: number;
  timeoutMs?: number;
  userAgent?: string;
  httpClient?: HttpClient;
}

export type HttpClient = (url: string, init: RequestInit) => Promise<Response>;

export interface CuratedRace {
  race: string;
  jurisdiction?: string | undefined;
  office?: string | undefined;
  candidates?: string | undefined;
  rating?: string | undefined;
  whyItMatters?: string | undefined;
  keyDates?: string | undefined;
  lastMargin?: string | undefined;
  sources?: string[] | undefined;
}
