import type { SourceId } from "./types.js";

export type MessageTemplate = {
  readonly sender: string;
  readonly content: string;
};

export const SIMULATED_MESSAGES: Record<SourceId, readonly MessageTemplate[]> = {
  linkedin: [
    {
      sender: "Priya Raman, Talent Partner",
      content: "Hi! I came across your profile and think you'd be a great fit for a staff role on our platform team. Open to a quick call this week?",
    },
    {
      sender: "Marco Delgado",
      content: "Thanks for connecting! I'd love to hear more about your work on developer tooling sometime.",
    },
  ],
  gmail: [
    {
      sender: "billing@vendor.example",
      content: "Hello, your invoice for October is attached. Please confirm receipt and let us know if the pricing looks right.",
    },
    {
      sender: "teammate@company.example",
      content: "Could you review the latest project proposal before Thursday's meeting?",
    },
  ],
  telegram: [
    { sender: "Alex", content: "Hey, are you free for a quick call tomorrow afternoon?" },
    { sender: "Sam", content: "Thanks again for helping me debug the deploy script!" },
  ],
  facebook: [
    { sender: "Aunt Lena", content: "Happy birthday sweetheart! Hope you have a wonderful day with the family." },
    { sender: "Jordan", content: "Are you coming to the meetup this weekend?" },
  ],
  instagram: [
    { sender: "trailrunner.kai", content: "Love your latest post! Where was that photo taken?" },
    { sender: "bakery.bloom", content: "Can you share the recipe for that sourdough?" },
  ],
};

/** Chance per fetch that the simulator produces a message. */
export const SIMULATED_MESSAGE_PROBABILITY: Record<SourceId, number> = {
  linkedin: 0.3,
  gmail: 0.2,
  telegram: 0.4,
  facebook: 0.25,
  instagram: 0.35,
};
