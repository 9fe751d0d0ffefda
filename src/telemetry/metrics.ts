import { metrics } from '@opentelemetry/api';

const meter = metrics.getMeter('chart-gate');

const http = {
  duration: meter.createHistogram('http.server.request.duration', {
    description: 'Duration of inbound HTTP requests',
    unit: 'ms'
  }),
  requests: meter.createCounter('http.server.request.count', {
    description: 'Count of inbound HTTP requests'
  }),
  errors: meter.createCounter('http.server.request.errors', {
    description: 'Count of HTTP 5xx responses'
  })
};

const gate = {
  decisions: meter.createCounter('gate.decisions', {
    description: 'Count of gate admissions and rejections by outcome'
  }),
  commits: meter.createCounter('gate.usage.commits', {
    description: 'Count of billed requests recorded against a tenant quota'
  })
};

const db = {
  duration: meter.createHistogram('db.client.query.duration', {
    description: 'Duration of database queries',
    unit: 'ms'
  }),
  queries: meter.createCounter('db.client.query.count', {
    description: 'Count of database queries'
  }),
  errors: meter.createCounter('db.client.query.errors', {
    description: 'Count of failed database queries'
  })
};

export interface HttpRequestAttributes {
  method: string;
  route: string;
  status_code: number;
  auth_source: string;
}

export interface GateDecisionAttributes {
  outcome: string;
  auth_source: string;
}

export interface DbQueryAttributes {
  store: string;
  success: 'true' | 'false';
}

/** 5xx responses are counted as errors as well. */
export function recordHttpRequest(attributes: HttpRequestAttributes, durationMs: number): void {
  http.duration.record(durationMs, { ...attributes });
  http.requests.add(1, { ...attributes });
  if (attributes.status_code >= 500) {
    http.errors.add(1, { ...attributes });
  }
}

export function recordGateDecision(attributes: GateDecisionAttributes): void {
  gate.decisions.add(1, { ...attributes });
}

export function recordUsageCommit(attributes: { plan_id: string }): void {
  gate.commits.add(1, attributes);
}

export function recordDbQuery(attributes: DbQueryAttributes, durationMs: number): void {
  db.duration.record(durationMs, { ...attributes });
  db.queries.add(1, { ...attributes });
  if (attributes.success === 'false') {
    db.errors.add(1, { store: attributes.store });
  }
}
