import { z } from "zod";

/**
 * Reply of POST /start_stream
 */
export const startStreamReplySchema = z.object({
  message: z.string().optional(),
});

/**
 * Structured reply of POST /main. Bodies that do not match are kept as text only.
 */
export const recognitionReplySchema = z
  .object({
    name: z.string().optional(),
    message: z.string().optional(),
    distance: z.number().optional(),
  })
  .refine(
    (reply) => reply.name !== undefined || reply.message !== undefined || reply.distance !== undefined,
    "reply has none of name, message, distance"
  );
