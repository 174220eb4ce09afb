export type JwtPayloadType = {
  id: number;
  sessionId: number;
  iat: number;
  exp: number;
};
