/**
 * Subject Section Detection
 *
 * Finds the slice of an exam paper that belongs to one subject, skipping
 * the instruction pages in front of it and stopping at the next subject's
 * header. Only short header-shaped lines are considered, so a question
 * that happens to mention "physics" or "biology" does not move a boundary.
 *
 * Markers are regex sources built by sectionMarkersFor() in lib/config.ts.
 */

import type { SectionBounds } from "./types";

export interface SectionMarkers {
  start: string[];
  end: string[];
}

const MAX_HEADER_CHARS = 60;
const MAX_HEADER_WORDS = 4;

/**
 * A header is a short line that is not a numbered item or an option,
 * written in capitals or only a few words long.
 */
export function isHeaderLine(line: string): boolean {
  const trimmed = line.trim();
  if (!trimmed || trimmed.length > MAX_HEADER_CHARS) return false;
  if (/^\d+\.(?!\d)/.test(trimmed) || /^\([1-4]\)/.test(trimmed)) return false;
  if (/^answer\s*\(/i.test(trimmed)) return false;

  const letters = trimmed.replace(/[^A-Za-z]/g, "");
  if (letters.length > 0 && letters === letters.toUpperCase()) return true;
  return trimmed.split(/\s+/).length <= MAX_HEADER_WORDS;
}

function compile(patterns: string[]): RegExp[] {
  return patterns.map((p) => new RegExp(p, "i"));
}

function matchesAny(line: string, patterns: RegExp[]): boolean {
  return patterns.some((p) => p.test(line));
}

/**
 * Locate the subject section in normalised lines.
 *
 * The section starts after the first header naming the subject (and no
 * other subject, which rules out "Physics, Chemistry and Biology" cover
 * lines) and ends before the first later header naming another subject.
 * Without a start header the whole text is used.
 */
export function findSubjectSection(lines: string[], markers: SectionMarkers): SectionBounds {
  const start = compile(markers.start);
  const end = compile(markers.end);

  let startLine = 0;
  let found = false;
  let startHeader: string | undefined;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (isHeaderLine(line) && matchesAny(line, start) && !matchesAny(line, end)) {
      startLine = i + 1;
      found = true;
      startHeader = line.trim();
      break;
    }
  }

  let endLine = lines.length;
  let endHeader: string | undefined;
  for (let i = startLine; i < lines.length; i++) {
    const line = lines[i];
    if (isHeaderLine(line) && matchesAny(line, end) && !matchesAny(line, start)) {
      endLine = i;
      endHeader = line.trim();
      break;
    }
  }

  return { found, startLine, endLine, startHeader, endHeader };
}
