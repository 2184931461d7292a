// ═══════════════════════════════════════════════════════════════════════════════
// CRISIS RESOURCES — Returned Alongside Replies that Raised a Crisis Insight
// ═══════════════════════════════════════════════════════════════════════════════

export interface CrisisResource {
  name: string;
  contact: string;
  available: string;
}

export const CRISIS_RESOURCES: readonly CrisisResource[] = [
  { name: '988 Suicide & Crisis Lifeline', contact: 'Call or text 988', available: '24/7' },
  { name: 'Crisis Text Line', contact: 'Text HOME to 741741', available: '24/7' },
  { name: 'Emergency Services', contact: 'Call 911 or your local emergency number', available: '24/7' },
];
