import type { JSONSchemaType } from "ajv";
import { createSchemaValidator } from "./validator";
import type { ChatCompletionEnvelope } from "./types";

export const chatCompletionEnvelopeSchema: JSONSchemaType<ChatCompletionEnvelope> = {
  $id: "voice-expense-recorder://schemas/chat-completion-envelope.json",
  type: "object",
  required: ["choices"],
  properties: {
    id: { type: "string", nullable: true },
    choices: {
      type: "array",
      minItems: 1,
      items: {
        type: "object",
        required: ["message"],
        properties: {
          message: {
            type: "object",
            required: ["content"],
            properties: {
              role: { type: "string", nullable: true },
              content: { type: "string" },
            },
          },
          finish_reason: { type: "string", nullable: true },
        },
      },
    },
  },
};

export const validateChatCompletionEnvelope = createSchemaValidator(chatCompletionEnvelopeSchema);
