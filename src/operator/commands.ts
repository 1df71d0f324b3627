export type ButtonAction = "generate" | "ignore" | "manual" | "edit" | "send";

export type OperatorCommand =
  | { readonly kind: "start" }
  | { readonly kind: "status" }
  | { readonly kind: "next" }
  | { readonly kind: "generate"; readonly messageId: number }
  | { readonly kind: "ignore"; readonly messageId: number }
  | { readonly kind: "manual"; readonly messageId: number }
  | { readonly kind: "edit"; readonly responseId: number }
  | { readonly kind: "send"; readonly responseId: number }
  | { readonly kind: "text"; readonly text: string };

const BUTTON_RE = /^(generate|ignore|manual|edit|send)[:_](\d+)$/;
const SLASH_RE = /^\/(start|status|next)(?:@\w+)?$/i;

function toButtonCommand(action: ButtonAction, id: number): OperatorCommand {
  switch (action) {
    case "generate":
    case "ignore":
    case "manual":
      return { kind: action, messageId: id };
    case "edit":
    case "send":
      return { kind: action, responseId: id };
  }
}

function isButtonAction(value: string): value is ButtonAction {
  return value === "generate" || value === "ignore" || value === "manual" || value === "edit" || value === "send";
}

/**
 * Parses button payloads (`generate:12`, also the older `generate_12`),
 * the bare and slash forms of start/status/next, and anything else as
 * free text.
 */
export function parseOperatorCommand(input: string): OperatorCommand {
  const trimmed = input.trim();
  const lowered = trimmed.toLowerCase();

  if (lowered === "next" || lowered === "start" || lowered === "status") {
    return { kind: lowered };
  }

  const slash = SLASH_RE.exec(trimmed);
  const slashName = slash?.[1]?.toLowerCase();
  if (slashName === "next" || slashName === "start" || slashName === "status") {
    return { kind: slashName };
  }

  const button = BUTTON_RE.exec(trimmed);
  const action = button?.[1];
  const id = Number(button?.[2]);
  if (action && isButtonAction(action) && Number.isSafeInteger(id)) {
    return toButtonCommand(action, id);
  }

  return { kind: "text", text: input };
}

/** Payload carried by an inline button. */
export function buttonPayload(action: ButtonAction, id: number): string {
  return `${action}:${id}`;
}
