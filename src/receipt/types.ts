import { z } from 'zod'

import { StatefulActionJsonSchema } from '../core/stateful.js'

export const RECEIPT_VERSION = 1
export type ReceiptVersion = typeof RECEIPT_VERSION

export const DEFAULT_RECEIPT_PATH = '/nix/receipt.json'

export const PlannerRecordSchema = z.object({
  planner: z.string().min(1),
  settings: z.record(z.unknown()),
})

export const ReceiptSchema = z.object({
  version: z.literal(RECEIPT_VERSION),
  planner: PlannerRecordSchema,
  actions: z.array(StatefulActionJsonSchema),
})

export type ReceiptJson = z.infer<typeof ReceiptSchema>
