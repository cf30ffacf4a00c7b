/**
 * Device Schemas — What the backend reports about the controlled device.
 */
import { z } from "zod/v4";

/** Screen size queried from the backend once, at construction. */
export const ScreenDimensions = z.object({
    height: z.number().int().positive(),
    width: z.number().int().positive(),
    channels: z.number().int().positive().default(3),
});
export type ScreenDimensions = z.infer<typeof ScreenDimensions>;
export type ScreenDimensionsInput = z.input<typeof ScreenDimensions>;
