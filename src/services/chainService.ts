import { z } from "zod";

import { baseUnits, numeric, nonNegative } from "../lib/schema";
import type { MetricFields, UpstreamResult } from "../types";
import type { UpstreamClient } from "./upstreamClient";

const statusSchema = z.object({
	result: z.object({
		node_info: z
			.object({
				network: z.string().optional(),
				moniker: z.string().optional(),
				version: z.string().optional(),
			})
			.optional(),
		sync_info: z.object({
			latest_block_height: nonNegative,
			latest_block_time: z.string().optional(),
			catching_up: z.boolean().optional().default(false),
		}),
	}),
});

const netInfoSchema = z.object({
	result: z.object({
		n_peers: nonNegative,
	}),
});

const validatorsSchema = z.object({
	result: z.object({
		validators: z.array(
			z.object({
				address: z.string().optional(),
				voting_power: nonNegative.optional().default(0),
			})
		),
		total: nonNegative.optional(),
	}),
});

const stakingPoolSchema = z.object({
	pool: z.object({
		bonded_tokens: baseUnits,
		not_bonded_tokens: baseUnits,
	}),
});

const bondedValidatorsSchema = z.object({
	validators: z.array(
		z.object({
			operator_address: z.string().optional(),
			commission: z
				.object({
					commission_rates: z.object({ rate: numeric }),
				})
				.optional(),
		})
	),
	pagination: z
		.object({ total: nonNegative.optional() })
		.nullable()
		.optional(),
});

const supplySchema = z.object({
	amount: z.object({
		denom: z.string(),
		amount: baseUnits,
	}),
});

export interface ChainSourceOptions {
	rpc: UpstreamClient;
	rest: UpstreamClient;
	chainId: string;
	denom: string;
	decimals: number;
}

export interface ChainSources {
	fetchStatus: () => Promise<UpstreamResult<MetricFields>>;
	fetchNetInfo: () => Promise<UpstreamResult<MetricFields>>;
	fetchValidators: () => Promise<UpstreamResult<MetricFields>>;
	fetchStakingPool: () => Promise<UpstreamResult<MetricFields>>;
	fetchBondedValidators: () => Promise<UpstreamResult<MetricFields>>;
	fetchSupply: () => Promise<UpstreamResult<MetricFields>>;
}

// Validator pages are capped at 100 by the RPC; the total comes back separately.
const VALIDATORS_PER_PAGE = 100;

// The decimal point is placed on the digit string so only the final conversion rounds.
export function toDisplayUnits(amount: bigint, decimals: number): number {
	if (decimals <= 0) {
		return Number(amount);
	}
	const digits = amount.toString().padStart(decimals + 1, "0");
	const whole = digits.slice(0, -decimals);
	const fraction = digits.slice(-decimals);
	return Number(`${whole}.${fraction}`);
}

export function createChainSources(options: ChainSourceOptions): ChainSources {
	const { rpc, rest, chainId, denom, decimals } = options;

	const fetchStatus = async (): Promise<UpstreamResult<MetricFields>> => {
		const result = await rpc.fetch({ path: "/status", schema: statusSchema });
		if (!result.ok) {
			return result;
		}
		const { node_info: nodeInfo, sync_info: syncInfo } = result.value.result;
		return {
			ok: true,
			value: {
				block_height: syncInfo.latest_block_height,
				latest_block_time: syncInfo.latest_block_time ?? null,
				chain_id: nodeInfo?.network ?? chainId,
				catching_up: syncInfo.catching_up,
				moniker: nodeInfo?.moniker ?? "unknown",
				node_version: nodeInfo?.version ?? "unknown",
			},
		};
	};

	const fetchNetInfo = async (): Promise<UpstreamResult<MetricFields>> => {
		const result = await rpc.fetch({ path: "/net_info", schema: netInfoSchema });
		if (!result.ok) {
			return result;
		}
		return { ok: true, value: { peer_count: result.value.result.n_peers } };
	};

	const fetchValidators = async (): Promise<UpstreamResult<MetricFields>> => {
		const result = await rpc.fetch({
			path: "/validators",
			query: { per_page: VALIDATORS_PER_PAGE },
			schema: validatorsSchema,
		});
		if (!result.ok) {
			return result;
		}
		const { validators, total } = result.value.result;
		return {
			ok: true,
			value: {
				validator_count: total ?? validators.length,
				total_voting_power: validators.reduce(
					(sum, validator) => sum + validator.voting_power,
					0
				),
			},
		};
	};

	const fetchStakingPool = async (): Promise<UpstreamResult<MetricFields>> => {
		const result = await rest.fetch({
			path: "/cosmos/staking/v1beta1/pool",
			schema: stakingPoolSchema,
		});
		if (!result.ok) {
			return result;
		}
		const { pool } = result.value;
		return {
			ok: true,
			value: {
				bonded_tokens: toDisplayUnits(pool.bonded_tokens, decimals),
				not_bonded_tokens: toDisplayUnits(pool.not_bonded_tokens, decimals),
			},
		};
	};

	const fetchBondedValidators = async (): Promise<UpstreamResult<MetricFields>> => {
		const result = await rest.fetch({
			path: "/cosmos/staking/v1beta1/validators",
			query: { status: "BOND_STATUS_BONDED", "pagination.limit": 200 },
			schema: bondedValidatorsSchema,
		});
		if (!result.ok) {
			return result;
		}
		const { validators, pagination } = result.value;
		const rates = validators.map(
			(validator) => validator.commission?.commission_rates.rate ?? 0.05
		);
		const avgCommissionRate =
			rates.length > 0
				? rates.reduce((sum, rate) => sum + rate, 0) / rates.length
				: 0.05;
		// The REST API reports total 0 unless count_total was requested.
		const reportedTotal = pagination?.total ?? 0;
		return {
			ok: true,
			value: {
				active_validators: reportedTotal > 0 ? reportedTotal : validators.length,
				avg_commission_rate: avgCommissionRate,
			},
		};
	};

	const fetchSupply = async (): Promise<UpstreamResult<MetricFields>> => {
		const result = await rest.fetch({
			path: "/cosmos/bank/v1beta1/supply/by_denom",
			query: { denom },
			schema: supplySchema,
		});
		if (!result.ok) {
			return result;
		}
		return {
			ok: true,
			value: {
				total_supply: toDisplayUnits(result.value.amount.amount, decimals),
			},
		};
	};

	return {
		fetchStatus,
		fetchNetInfo,
		fetchValidators,
		fetchStakingPool,
		fetchBondedValidators,
		fetchSupply,
	};
}
