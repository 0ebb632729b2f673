export type TestKind = 'api' | 'mcp-protocol' | 'ui' | 'service-lifecycle';

// Serialized as summary.json; field names are part of the artifact format.
export interface TestSummary {
  test_name: string;
  kind: TestKind;
  passed: boolean;
  skipped: boolean;
  duration: string;
  duration_ms: number;
  timestamp: string;   // ISO 8601
  details: string;
  errors: readonly string[];
  screenshots: readonly string[];
  logs: readonly string[];
}
