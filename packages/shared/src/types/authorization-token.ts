/**
 * Request to mint a purpose-bound authorization token
 */
export interface IssueAuthorizationTokenRequest {
  purpose: string;
  oneTime?: boolean;
}

export interface IssueAuthorizationTokenResponse {
  token: string;
  purpose: string;
  oneTime: boolean;
  expiresAt: string;
}

export interface VerifyAuthorizationTokenRequest {
  token: string;
  purpose: string;
}

export interface VerifyAuthorizationTokenResponse {
  subjectId: string;
  purpose: string;
  expiresAt: string;
}
