import { z } from "zod";

/**
 * Schema for /api/recognize/gallery endpoint
 */
export const galleryRecognitionSchema = z.object({
  image_path: z.string().trim().optional(),
});

/**
 * Schema for /api/captures/:file_name params
 */
export const captureFileSchema = z.object({
  file_name: z
    .string()
    .regex(/^[\w-]+\.(jpg|jpeg|png|gif|webp)$/i, "file_name must be a plain image file name"),
});

/**
 * Schema for /api/captures/:file_name query string
 */
export const capturePreviewQuerySchema = z.object({
  annotate: z.enum(["true", "false"]).optional(),
});
