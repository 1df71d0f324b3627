export type GmailTransportParams = {
  readonly accessToken: string;
  readonly baseUrl?: string;
  readonly timeoutMs?: number;
  readonly fetchImpl?: typeof fetch;
  readonly maxResults?: number;
};

export type GmailProfile = {
  readonly emailAddress: string;
};

export type GmailMessageRef = {
  readonly id: string;
  readonly threadId: string;
};

export type GmailListResponse = {
  readonly messages?: readonly GmailMessageRef[];
};

export type GmailHeader = {
  readonly name: string;
  readonly value: string;
};

export type GmailMessage = {
  readonly id: string;
  readonly threadId: string;
  readonly snippet?: string;
  readonly internalDate?: string;
  readonly payload?: {
    readonly headers?: readonly GmailHeader[];
  };
};
