export type DatabaseConfig = {
  url?: string;
  host?: string;
  port: number;
  username?: string;
  password?: string;
  name?: string;
  synchronize: boolean;
  logging: boolean;
  maxConnections: number;
  sslEnabled: boolean;
  rejectUnauthorized: boolean;
};
