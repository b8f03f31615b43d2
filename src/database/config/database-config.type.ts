export type DatabaseDriver = 'relational' | 'memory';

export type DatabaseConfig = {
  // 'memory' keeps summaries for the lifetime of the process (CLI runs, local tooling)
  driver: DatabaseDriver;
  url?: string;
  type?: string;
  host?: string;
  port?: number;
  password?: string;
  name?: string;
  username?: string;
  synchronize?: boolean;
  maxConnections: number;
  sslEnabled?: boolean;
  rejectUnauthorized?: boolean;
  ca?: string;
  key?: string;
  cert?: string;
  // false = no logging, array = specific log types
  logging?: false | ('query' | 'error' | 'schema' | 'warn' | 'info' | 'log')[];
};
