/**
 * Heuristic credibility score, used when the model does not return a number.
 *
 * Blends domain reputation with evidence vocabulary in the content and
 * penalises hedging language. Always in [0, 1].
 */

const REPUTABLE_DOMAINS: Record<string, number> = {
  'arxiv.org': 0.9,
  'semanticscholar.org': 0.8,
  'acm.org': 0.9,
  'ieee.org': 0.95,
  'nature.com': 0.95,
  'science.org': 0.95,
  'springer.com': 0.9,
  'reuters.com': 0.85,
  'mdpi.com': 0.75,
  'wikipedia.org': 0.7,
  'medium.com': 0.5,
};

const HEDGING = ['might', 'may', 'could', 'possibly', 'suggests', 'appears', 'we believe', 'we think'];
const STRONG_EVIDENCE = [
  'dataset', 'benchmark', 'code', 'github', 'results', 'evaluation',
  'experiment', 'reproducible', 'appendix', 'supplementary',
];

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function domainScore(url: string): number {
  let host: string;
  try {
    host = new URL(url).hostname.toLowerCase();
  } catch {
    return 0.5;
  }
  const parts = host.split('.');
  const base = parts.length >= 2 ? parts.slice(-2).join('.') : host;
  return REPUTABLE_DOMAINS[base] ?? 0.6;
}

export function evidenceScore(text: string): number {
  const lower = text.toLowerCase();
  const positive = STRONG_EVIDENCE.filter((word) => lower.includes(word)).length;
  const negative = HEDGING.filter((word) => lower.includes(word)).length;
  const numbers = lower.match(/\b\d+(\.\d+)?\b/g)?.length ?? 0;

  const score = 0.5 + Math.min(positive * 0.08, 0.25) + Math.min(numbers * 0.01, 0.1) - Math.min(negative * 0.05, 0.25);
  return clamp(score, 0.1, 0.95);
}

export function heuristicCredibility(url: string, content: string): number {
  let score = 0.5 * 0.5 + 0.5 * domainScore(url);
  score = 0.5 * score + 0.5 * evidenceScore(content);

  const words = content.split(/\s+/).filter(Boolean).length;
  if (words > 120) score += 0.05;
  else if (words < 30) score -= 0.05;

  return clamp(score, 0, 1);
}
