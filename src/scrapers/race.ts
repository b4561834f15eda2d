import { dedupeCandidates, mergeResearchLinks } from '../extraction';
import type { PageExtraction, Race, RaceOutcome, Target } from '../types';

/** Explicit id, else "{STATE}-{OFFICE}-{cycle}" with the district appended. */
export function raceIdFor(target: Target): string {
  if (target.id?.trim()) return target.id.trim();
  const base = `${target.state.trim().toUpperCase()}-${target.office.trim().toUpperCase()}-${target.cycle}`;
  return target.district ? `${base}-${target.district}` : base;
}

/** An empty race carrying only the target's descriptor fields. */
export function createRace(target: Target): Race {
  return {
    id: raceIdFor(target),
    cycle: target.cycle,
    office: target.office.trim().toUpperCase(),
    state: target.state.trim().toUpperCase(),
    ...(target.district && { district: target.district }),
    candidates: [],
    sources: {},
    researchLinks: [],
  };
}

export function createOutcome(race: Race): RaceOutcome {
  return { raceId: race.id, race, notes: [], errors: [] };
}

/** Copies what a page yielded onto the race; unset fields stay unset. */
export function applyExtraction(outcome: RaceOutcome, extraction: PageExtraction): void {
  const { race } = outcome;
  if (extraction.title) race.title = extraction.title;
  if (extraction.primaryDate) race.primaryDate = extraction.primaryDate;
  if (extraction.electionDate) race.electionDate = extraction.electionDate;
  race.candidates = dedupeCandidates([...race.candidates, ...extraction.candidates]);
  race.researchLinks = mergeResearchLinks(race.researchLinks, extraction.researchLinks);
  outcome.notes.push(...extraction.notes);
}
