export type AuthConfig = {
  secret: string;
  expires: string;
  issuer?: string;
};
