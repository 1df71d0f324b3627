export type MetaPlatform = "messenger" | "instagram";

export type MetaGraphTransportParams = {
  readonly source: "facebook" | "instagram";
  readonly accessToken: string;
  readonly baseUrl?: string;
  readonly apiVersion?: string;
  readonly timeoutMs?: number;
  readonly fetchImpl?: typeof fetch;
};

export type GraphAccount = {
  readonly id: string;
  readonly name?: string;
};

export type GraphMessage = {
  readonly id: string;
  readonly message?: string;
  readonly created_time: string;
  readonly from: {
    readonly id: string;
    readonly name?: string;
    readonly username?: string;
  };
};

export type GraphConversationPage = {
  readonly data: ReadonlyArray<{
    readonly id: string;
    readonly messages?: {
      readonly data: readonly GraphMessage[];
    };
  }>;
};
