import { z, type ZodError } from "zod";

const chatTurnSchema = z.union([
  z.object({ question: z.string(), answer: z.string() }),
  // [question, answer] pairs, as older clients send them.
  z.tuple([z.string(), z.string()]).transform(([question, answer]) => ({ question, answer })),
]);

export const askRequestSchema = z.object({
  question: z.string().trim().min(1, { message: "question is required" }),
  chat_history: z.array(chatTurnSchema).default([]),
  chart: z.boolean().optional(),
});

export type AskRequestBody = z.infer<typeof askRequestSchema>;

type ValidateAskResult = { valid: true; data: AskRequestBody } | { valid: false; error: string };

export const formatZodError = (error: ZodError): string => {
  const [firstIssue] = error.issues;
  if (firstIssue === undefined) return "Validation failed";
  const field = firstIssue.path.join(".");
  return field.length > 0 ? `${field}: ${firstIssue.message}` : firstIssue.message;
};

export const validateAskRequest = (body: unknown): ValidateAskResult => {
  const result = askRequestSchema.safeParse(body);
  if (!result.success) return { valid: false, error: formatZodError(result.error) };
  return { valid: true, data: result.data };
};
