import { describe, it, expect } from "vitest";
import { buildSystemPrompt, buildUserPrompt } from "./prompt.js";

describe("buildSystemPrompt", () => {
  it("names the platform and the length cap", () => {
    const prompt = buildSystemPrompt({ source: "linkedin", maxResponseLength: 280 });
    expect(prompt.startsWith("You draft replies to LinkedIn messages on behalf of the operator.")).toBe(true);
    expect(prompt).toContain("- At most 280 characters");
    expect(prompt).toContain("- Telegram: Conversational and friendly");
  });

  it("folds in operator preferences", () => {
    const prompt = buildSystemPrompt({
      source: "gmail",
      preferences: {
        writingStyle: "warm",
        personalityTraits: ["curious", "direct"],
        interests: [],
        responseRules: ["Never promise dates", "Sign off with -J"],
      },
    });
    expect(prompt.endsWith(
      "Writing style: warm\nPersonality traits: curious, direct\nResponse rules:\n- Never promise dates\n- Sign off with -J",
    )).toBe(true);
    expect(prompt).not.toContain("Interests:");
  });

  it("omits the preference block when there is nothing to add", () => {
    const prompt = buildSystemPrompt({ source: "gmail" });
    expect(prompt.endsWith("- Instagram: Visual and trendy")).toBe(true);
  });
});

describe("buildUserPrompt", () => {
  it("quotes sender and content", () => {
    expect(buildUserPrompt({ source: "facebook", sender: "Jo", content: "Still open tomorrow?" })).toBe(
      [
        "Write a reply to this Facebook message.",
        "",
        "Sender: Jo",
        "Message: Still open tomorrow?",
        "",
        "Reply naturally and in context. Output only the reply text.",
      ].join("\n"),
    );
  });
});
