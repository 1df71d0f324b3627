export type LinkedInTransportParams = {
  readonly accessToken: string;
  readonly baseUrl?: string;
  readonly timeoutMs?: number;
  readonly fetchImpl?: typeof fetch;
  readonly apiVersion?: string;
};

export type LinkedInProfile = {
  readonly sub: string;
  readonly name?: string;
};

export type LinkedInMessage = {
  readonly id: string;
  readonly createdAt: number;
  readonly conversationUrn: string;
  readonly sender: {
    readonly urn: string;
    readonly name?: string;
    readonly headline?: string;
  };
  readonly body: {
    readonly text: string;
  };
};

export type LinkedInMessagePage = {
  readonly elements: readonly LinkedInMessage[];
};
