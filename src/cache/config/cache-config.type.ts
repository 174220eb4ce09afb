export type CacheConfig = {
  enabled: boolean;
  host: string;
  port: number;
  password?: string;
  tls: boolean;
};
