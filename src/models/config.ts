export interface ServerConfig {
  api_port: number;
  cors?: {
    enabled: boolean;
    origins: string[];
  };
  rate_limit?: {
    window_ms: number;
    max_requests: number;
  };
}

/**
 * One selectable kind of test case. `max_count` bounds issue and text
 * sources, `url_max_count` web pages.
 */
export interface TestTypeConfig {
  prefix: string;
  description: string;
  max_count: number;
  url_max_count: number;
}

export type TestTypesConfig = Record<string, TestTypeConfig>;

export interface AppConfig {
  server: ServerConfig;
  testTypes: TestTypesConfig;
}
