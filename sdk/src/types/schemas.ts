import { type Address, checksumAddress, type Hex, isAddress, isHex } from "viem";
import { z } from "zod";

export const checkedAddressSchema = z
	.string()
	.refine((arg) => isAddress(arg))
	.transform((arg) => checksumAddress(arg as Address));

export const hexDataSchema = z.custom<Hex>((arg) => isHex(arg), "Invalid hex data");

const mnemonicSchema = z
	.string()
	.trim()
	.refine((arg) => [12, 15, 18, 21, 24].includes(arg.split(/\s+/).length), {
		message: "Mnemonic must have 12, 15, 18, 21 or 24 words",
	});

export const blockReferenceSchema = z.union([z.literal("latest"), z.coerce.bigint().nonnegative()]);

export const committeeMemberSchema = z.object({
	sigKey: hexDataSchema,
	dhKey: hexDataSchema,
	dkgKey: hexDataSchema,
	networkAddress: z.string(),
	batchPosterAddress: z.string(),
	sigKeyAddress: checkedAddressSchema,
});

export const committeeSchema = z.object({
	id: z.bigint().nonnegative(),
	registeredBlockNumber: z.bigint().nonnegative(),
	effectiveTimestamp: z.bigint().nonnegative(),
	members: z.array(committeeMemberSchema),
});

export const committeeCreatedEventSchema = z.object({
	id: z.bigint().nonnegative(),
});

export const rawLogSchema = z.object({
	address: checkedAddressSchema,
	data: hexDataSchema,
	topics: z.tuple([hexDataSchema], hexDataSchema),
	blockNumber: z.bigint(),
	logIndex: z.int().nonnegative(),
	transactionHash: hexDataSchema,
});

export const signerConfigSchema = z.object({
	MNEMONIC: mnemonicSchema.default("test test test test test test test test test test test junk"),
	ACCOUNT_INDEX: z.coerce.number().int().nonnegative().default(0),
	RPC_URL: z.url().default("http://localhost:8545"),
	CHAIN_ID: z.coerce.number().int().positive().default(31337),
});

export const deployConfigSchema = signerConfigSchema.extend({
	MANAGER_ADDRESS: checkedAddressSchema,
	ARTIFACTS_DIR: z.string().min(1).default("out"),
});

export const watchConfigSchema = z.object({
	WS_URL: z.url({ protocol: /^wss?$/ }),
	RPC_URL: z.url().default("http://localhost:8545"),
	CHAIN_ID: z.coerce.number().int().positive().default(31337),
	KEY_MANAGER_ADDRESS: checkedAddressSchema,
	FROM_BLOCK: blockReferenceSchema.default("latest"),
	MAX_RETRIES: z.coerce.number().int().nonnegative().optional(),
	RETRY_INTERVAL_MS: z.coerce.number().int().positive().optional(),
});

export type CommitteeMember = z.output<typeof committeeMemberSchema>;
export type Committee = z.output<typeof committeeSchema>;
export type CommitteeCreatedEvent = z.output<typeof committeeCreatedEventSchema>;
export type BlockReference = z.output<typeof blockReferenceSchema>;
export type DeployConfig = z.output<typeof deployConfigSchema>;
export type WatchConfig = z.output<typeof watchConfigSchema>;
