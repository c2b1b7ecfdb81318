export type JwtPayloadType = {
  id: number;
  iat?: number;
  exp?: number;
};
