import type { School } from '../types/chunk.js';

/** Schools recognised out of the box, matched against a crawled URL's host in this order. */
export const DEFAULT_SCHOOLS: readonly School[] = [
  { id: 'cmu', name: 'Carnegie Mellon University', domain: 'cmu.edu' },
  { id: 'caltech', name: 'California Institute of Technology', domain: 'caltech.edu' },
  { id: 'stanford', name: 'Stanford University', domain: 'stanford.edu' },
  { id: 'berkeley', name: 'UC Berkeley', domain: 'berkeley.edu' },
  { id: 'mit', name: 'MIT', domain: 'mit.edu' },
  { id: 'gatech', name: 'Georgia Tech', domain: 'gatech.edu' },
  { id: 'uiuc', name: 'UIUC', domain: 'illinois.edu' },
  { id: 'cornell', name: 'Cornell University', domain: 'cornell.edu' },
  { id: 'ucla', name: 'UCLA', domain: 'ucla.edu' },
  { id: 'ucsd', name: 'UC San Diego', domain: 'ucsd.edu' },
  { id: 'uw', name: 'University of Washington', domain: 'washington.edu' },
];

function hostnameOf(url: string): string {
  try {
    return new URL(url).hostname.toLowerCase();
  } catch {
    return '';
  }
}

function hostMatches(hostname: string, domain: string): boolean {
  const d = domain.toLowerCase();
  return hostname === d || hostname.endsWith(`.${d}`);
}

/** Resolves which school a crawled page belongs to. */
export class SchoolRegistry {
  private readonly schools: readonly School[];

  constructor(schools: readonly School[] = DEFAULT_SCHOOLS) {
    this.schools = schools;
  }

  list(): School[] {
    return this.schools.map((school) => ({ ...school }));
  }

  get(id: string): School | undefined {
    return this.schools.find((school) => school.id === id);
  }

  /**
   * First school whose domain matches the URL's host; failing that, the
   * school whose id equals `filenameHint` or whose name contains it. A hint
   * like `stanford_cs_master` falls back to its leading segment.
   */
  resolve(url: string, filenameHint?: string): School | undefined {
    const hostname = hostnameOf(url);
    if (hostname) {
      const byDomain = this.schools.find(
        (school) => school.domain !== undefined && hostMatches(hostname, school.domain),
      );
      if (byDomain) {
        return byDomain;
      }
    }

    const hint = filenameHint?.trim().toLowerCase();
    if (!hint) {
      return undefined;
    }
    const byHint = this.matchHint(hint);
    if (byHint) {
      return byHint;
    }
    const [leading] = hint.split('_');
    return leading && leading !== hint ? this.matchHint(leading) : undefined;
  }

  private matchHint(hint: string): School | undefined {
    return this.schools.find(
      (school) => school.id.toLowerCase() === hint || school.name.toLowerCase().includes(hint),
    );
  }

  /** Ids and names, for keeping school mentions intact when rewriting queries. */
  entityNames(): string[] {
    return [...new Set(this.schools.flatMap((school) => [school.id, school.name]))];
  }
}
