/**
 * Account overview schemas.
 */

import { z } from "zod";

export type VolumeWindow = "7d" | "14d" | "30d" | "90d";

const optionalNumber = z.number().nullish();

const accountOverviewFields = {
  perp_equity_balance: z.number(),
  unrealized_pnl: z.number(),
  unrealized_funding_cost: z.number(),
  cross_margin_ratio: z.number(),
  maintenance_margin: z.number(),
  cross_account_leverage_ratio: optionalNumber,
  net_deposits: optionalNumber,
  all_time_return: optionalNumber,
  pnl_90d: optionalNumber,
  sharpe_ratio: optionalNumber,
  max_drawdown: optionalNumber,
  weekly_win_rate_12w: optionalNumber,
  average_cash_position: optionalNumber,
  average_leverage: optionalNumber,
  cross_account_position: z.number(),
  total_margin: z.number(),
  usdc_cross_withdrawable_balance: z.number(),
  usdc_isolated_withdrawable_balance: z.number(),
  realized_pnl: optionalNumber,
  liquidation_fees_paid: optionalNumber,
  liquidation_losses: optionalNumber,
};

export const accountOverviewSchema = z
  .object({ ...accountOverviewFields, volume: optionalNumber })
  .passthrough();

export type AccountOverview = z.infer<typeof accountOverviewSchema>;

/** Payload of `account_overview:<subaccount>`; the stream carries no volume */
export const accountOverviewMessageSchema = z.object({
  account_overview: z.object(accountOverviewFields).passthrough(),
});

export type AccountOverviewMessage = z.infer<typeof accountOverviewMessageSchema>;
