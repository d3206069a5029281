import { RawMessage } from './types';

export type SignalHint = 'interview' | 'reschedule';

export interface SignalResult {
  score: number;
  reasons: string[];
  hint: SignalHint | null;
}

const INTERVIEW_KEYWORDS = [
  'interview',
  'online assessment',
  'coding test',
  'aptitude test',
  'shortlisted',
  'placement drive',
  'hiring drive',
  'technical round',
  'hr round',
];

const RESCHEDULE_KEYWORDS = [
  'rescheduled',
  'reschedule',
  'postponed',
  'preponed',
  'makeup class',
  'make-up class',
  'extra class',
  'class cancelled',
  'class canceled',
  'shifted to',
  'moved to',
];

const PLACEMENT_SENDER_HINTS = ['placement', 'careers', 'recruit', 'talent', 'hiring', 'tpo'];

const ACADEMIC_SENDER_HINTS = ['faculty', 'professor', 'dept', 'department', 'academic', 'timetable'];

const SIGNAL_THRESHOLD = 20;

function matchedKeywords(text: string, keywords: string[]): string[] {
  const lower = text.toLowerCase();
  return keywords.filter((kw) => lower.includes(kw));
}

function senderMatches(from: string, hints: string[]): boolean {
  const lower = from.toLowerCase();
  return hints.some((hint) => lower.includes(hint));
}

function detectTimeMarkers(text: string): string[] {
  const markers: string[] = [];

  // 10:00, 9.30, 14:15
  if (/\b([01]?\d|2[0-3])[:.][0-5]\d\b/.test(text)) {
    markers.push('clock time');
  }

  // 10 am, 3PM
  if (/\b(1[0-2]|0?[1-9])\s?(am|pm)\b/i.test(text)) {
    markers.push('am/pm time');
  }

  // 2024-05-01, 01/05/2024
  if (/\b\d{4}-\d{2}-\d{2}\b|\b\d{1,2}\/\d{1,2}\/\d{2,4}\b/.test(text)) {
    markers.push('date');
  }

  if (/\b(monday|tuesday|wednesday|thursday|friday|saturday|sunday)\b/i.test(text)) {
    markers.push('weekday');
  }

  return markers;
}

export function scoreSchedulingSignals(message: Pick<RawMessage, 'subject' | 'from' | 'body'>): SignalResult {
  let interviewScore = 0;
  let rescheduleScore = 0;
  const reasons: string[] = [];

  const interviewInSubject = matchedKeywords(message.subject, INTERVIEW_KEYWORDS);
  if (interviewInSubject.length > 0) {
    interviewScore += 25;
    reasons.push(`Interview keyword in subject: ${interviewInSubject.join(', ')}`);
  }

  const rescheduleInSubject = matchedKeywords(message.subject, RESCHEDULE_KEYWORDS);
  if (rescheduleInSubject.length > 0) {
    rescheduleScore += 25;
    reasons.push(`Reschedule keyword in subject: ${rescheduleInSubject.join(', ')}`);
  }

  const interviewInBody = matchedKeywords(message.body, INTERVIEW_KEYWORDS);
  if (interviewInBody.length > 0) {
    interviewScore += 15;
    reasons.push('Interview keyword in body');
  }

  const rescheduleInBody = matchedKeywords(message.body, RESCHEDULE_KEYWORDS);
  if (rescheduleInBody.length > 0) {
    rescheduleScore += 15;
    reasons.push('Reschedule keyword in body');
  }

  if (senderMatches(message.from, PLACEMENT_SENDER_HINTS)) {
    interviewScore += 10;
    reasons.push('Placement/recruiting sender');
  }

  if (senderMatches(message.from, ACADEMIC_SENDER_HINTS)) {
    rescheduleScore += 10;
    reasons.push('Academic sender');
  }

  const markers = detectTimeMarkers(`${message.subject}\n${message.body}`);
  const markerBonus = markers.length >= 2 ? 10 : 0;
  if (markerBonus > 0) {
    reasons.push(`Time markers: ${markers.join(', ')}`);
  }

  const score = Math.max(interviewScore, rescheduleScore) + markerBonus;
  let hint: SignalHint | null = null;
  if (interviewScore > 0 || rescheduleScore > 0) {
    hint = rescheduleScore > interviewScore ? 'reschedule' : 'interview';
  }

  return { score, reasons, hint };
}

export function isExtractionCandidate(signals: Pick<SignalResult, 'score'>): boolean {
  return signals.score >= SIGNAL_THRESHOLD;
}
