export interface ExtractedFacts {
  userName?: string;
  age?: number;
}

const NAME_PATTERNS: RegExp[] = [
  /\bmy name is\s+([A-Za-z][A-Za-z'-]*)/i,
  /\bcall me\s+([A-Za-z][A-Za-z'-]*)/i,
  /\bi(?:'m| am)\s+called\s+([A-Za-z][A-Za-z'-]*)/i,
];

const AGE_PATTERNS: RegExp[] = [
  /\b(\d{1,3})\s*(?:years?|yrs?)\s*old\b/i,
  /\bi(?:'m| am)\s+(\d{1,3})\b/i,
  /\bmy age is\s+(\d{1,3})\b/i,
];

const MIN_AGE = 2;
const MAX_AGE = 119;

/**
 * Regex heuristics for personal details a user volunteers in chat.
 * Misses are expected; a match is never verified.
 */
export class FactExtractor {
  extract(message: string): ExtractedFacts {
    const facts: ExtractedFacts = {};

    const userName = this.extractName(message);
    if (userName) facts.userName = userName;

    const age = this.extractAge(message);
    if (age !== undefined) facts.age = age;

    return facts;
  }

  private extractName(message: string): string | undefined {
    for (const pattern of NAME_PATTERNS) {
      const match = pattern.exec(message);
      const candidate = match?.[1]?.replace(/['-]+$/, '');
      if (candidate && candidate.length > 1 && candidate.length < 20) {
        return candidate.charAt(0).toUpperCase() + candidate.slice(1);
      }
    }
    return undefined;
  }

  private extractAge(message: string): number | undefined {
    if (!/\d/.test(message)) return undefined;

    for (const pattern of AGE_PATTERNS) {
      const match = pattern.exec(message);
      if (!match) continue;

      const age = parseInt(match[1], 10);
      if (age >= MIN_AGE && age <= MAX_AGE) {
        return age;
      }
    }
    return undefined;
  }
}
