/**
 * HTTP 请求校验（zod）
 */

import { z } from "zod";

const language = z.enum(["zh", "en"]);

export const chatRequestSchema = z
  .object({
    messages: z
      .array(
        z.object({
          role: z.enum(["user", "assistant", "system"]),
          content: z.string(),
        })
      )
      .optional(),
    content: z.string().optional(),
    sessionId: z.string().trim().min(1).max(128).optional(),
    language: language.optional(),
  })
  .transform((body) => {
    const last = body.messages?.length ? body.messages[body.messages.length - 1] : undefined;
    return {
      input: (last ? last.content : (body.content ?? "")).trim(),
      sessionId: body.sessionId,
      language: body.language,
    };
  })
  .refine((body) => body.input.length > 0, { message: "消息不能为空", path: ["content"] })
  .refine((body) => body.input.length <= 1000, { message: "消息长度不能超过 1000 字符", path: ["content"] });

export const searchQuerySchema = z.object({
  q: z.string().trim().min(1).max(1000),
  lang: language.optional(),
  session: z.string().trim().min(1).max(128).optional(),
  sys_prompt: z.string().max(2000).optional(),
});

export type ChatRequestBody = z.infer<typeof chatRequestSchema>;
export type SearchQuery = z.infer<typeof searchQuerySchema>;
