import { z } from "zod";

export const oauthTokenSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().optional(),
  id_token: z.string().optional(),
  token_type: z.string().optional(),
  scope: z.string().optional(),
  expires_in: z.coerce.number().optional(),
  expires_at: z.number().optional(),
});

export const storedSessionSchema = z.object({
  email: z.string(),
  token: oauthTokenSchema,
});

// Vendor records pass through untouched; only the keys we read are checked.
export const modelTypeSchema = z
  .object({
    year: z.union([z.string(), z.number()]).optional(),
    engine: z.string().optional(),
  })
  .passthrough();

export const vehicleSummarySchema = z
  .object({
    vin: z.string(),
    modelName: z.string().optional(),
    customName: z.string().nullable().optional(),
    modelType: modelTypeSchema.optional(),
    systemInfo: z.unknown().optional(),
    timestamp: z.string().optional(),
    connect: z.boolean().optional(),
  })
  .passthrough();

export const vehicleListSchema = z.array(vehicleSummarySchema);

export const measurementSchema = z
  .object({
    key: z.string(),
    status: z
      .object({
        isEnabled: z.boolean(),
        cause: z.string().optional(),
      })
      .passthrough(),
    value: z.record(z.unknown()).optional(),
  })
  .passthrough();

export const vehicleOverviewSchema = vehicleSummarySchema.extend({
  measurements: z.array(measurementSchema).optional(),
  commands: z.array(z.unknown()).optional(),
});

export const vehiclePictureSchema = z
  .object({
    view: z.string(),
    url: z.string(),
  })
  .passthrough();

export const vehiclePictureListSchema = z.array(vehiclePictureSchema);
