export type TelegramTransportParams = {
  readonly token: string;
  readonly baseUrl?: string;
  readonly timeoutMs?: number;
  readonly fetchImpl?: typeof fetch;
};

export type TelegramUser = {
  readonly id: number;
  readonly is_bot: boolean;
  readonly first_name: string;
  readonly last_name?: string;
  readonly username?: string;
};

export type TelegramUpdate = {
  readonly update_id: number;
  readonly message?: {
    readonly message_id: number;
    readonly from?: TelegramUser;
    readonly chat: {
      readonly id: number;
      readonly type: "private" | "group" | "supergroup" | "channel";
    };
    readonly date: number;
    readonly text?: string;
    readonly caption?: string;
  };
};

export type TelegramApiResponse<T> = {
  readonly ok: boolean;
  readonly result?: T;
  readonly description?: string;
};
