import type { Plan } from './key-repository.js';

export const DEFAULT_PLANS: readonly Plan[] = [
  { id: 'free', name: 'Free', rateLimit: '10/minute', monthlyQuota: 100 },
  { id: 'pro', name: 'Pro', rateLimit: '100/minute', monthlyQuota: 10_000 },
  { id: 'enterprise', name: 'Enterprise', rateLimit: '1000/minute', monthlyQuota: 100_000 }
];
