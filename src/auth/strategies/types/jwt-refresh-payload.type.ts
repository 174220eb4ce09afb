export type JwtRefreshPayloadType = {
  sessionId: number;
  hash: string;
  iat: number;
  exp: number;
};
