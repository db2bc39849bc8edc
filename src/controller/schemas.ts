import { z } from "zod";

export const controllerTagSchema = z.object({
  scope: z.string(),
  tag: z.string(),
});

export const transportZoneRecordSchema = z.object({
  zone_uuid: z.string(),
  transport_type: z.string(),
  binding_config: z
    .object({
      vlan_translation: z.array(z.object({ transport: z.number().int() })).optional(),
    })
    .optional(),
});

export const logicalSwitchRecordSchema = z.object({
  uuid: z.string(),
  display_name: z.string().optional(),
  transport_zones: z.array(transportZoneRecordSchema).optional(),
  tags: z.array(controllerTagSchema).optional(),
  _relations: z
    .object({
      LogicalSwitchStatus: z.object({ lport_count: z.number().int().min(0) }).optional(),
    })
    .optional(),
});

export const logicalPortRecordSchema = z.object({
  uuid: z.string(),
  display_name: z.string().optional(),
  admin_status_enabled: z.boolean().optional(),
  tags: z.array(controllerTagSchema).optional(),
  _relations: z
    .object({
      LogicalSwitchConfig: z.object({ uuid: z.string() }).optional(),
    })
    .optional(),
});

/** Any controller object when only its uuid is consumed (create responses, zone lookups). */
export const objectRefSchema = z.object({ uuid: z.string() });

/** One page of a collection query. Items are validated separately against their own schema. */
export const queryPageSchema = z.object({
  results: z.array(z.unknown()).default([]),
  result_count: z.number().int().min(0).optional(),
  page_cursor: z.string().nullish(),
});

export type ControllerTag = z.infer<typeof controllerTagSchema>;
export type TransportZoneRecord = z.infer<typeof transportZoneRecordSchema>;
export type LogicalSwitchRecord = z.infer<typeof logicalSwitchRecordSchema>;
export type LogicalPortRecord = z.infer<typeof logicalPortRecordSchema>;
