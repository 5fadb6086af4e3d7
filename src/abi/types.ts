/**
 * Function-signature documents for the exchange's on-chain package.
 */

import { z } from "zod";

/** Fully-qualified function id: `address::module::function` */
export type MoveFunctionId = string;

export const moveFunctionSchema = z
  .object({
    name: z.string(),
    visibility: z.string(),
    is_entry: z.boolean(),
    is_view: z.boolean(),
    generic_type_params: z.array(z.record(z.unknown())),
    params: z.array(z.string()),
    return: z.array(z.string()),
  })
  .transform((fn) => ({
    name: fn.name,
    visibility: fn.visibility,
    isEntry: fn.is_entry,
    isView: fn.is_view,
    genericTypeParams: fn.generic_type_params,
    params: fn.params,
    returns: fn.return,
  }));

export type MoveFunction = z.output<typeof moveFunctionSchema>;

export const abiDataSchema = z.object({
  packageAddress: z.string(),
  network: z.string(),
  fullnodeUrl: z.string(),
  fetchedAt: z.string(),
  abis: z.record(moveFunctionSchema),
  errors: z.array(
    z.object({
      module: z.string(),
      function: z.string(),
      error: z.string(),
    })
  ),
  summary: z.object({
    totalModules: z.number().int(),
    totalFunctions: z.number().int(),
    successful: z.number().int(),
    failed: z.number().int(),
  }),
  modules: z.array(z.string()),
});

export type AbiData = z.output<typeof abiDataSchema>;
