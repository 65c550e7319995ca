import { type AbiEvent, type Address, decodeEventLog, type Hash } from "viem";
import type { ZodType } from "zod";
import { COMMITTEE_CREATED_EVENT } from "../types/abis.js";
import { type CommitteeCreatedEvent, committeeCreatedEventSchema, rawLogSchema } from "../types/schemas.js";
import { EventDecodeError } from "../utils/errors.js";

/** An event ABI together with the schema its decoded arguments must satisfy. */
export type EventDescriptor<T> = {
	event: AbiEvent;
	schema: ZodType<T>;
};

export type DecodedLog<T> = {
	eventName: string;
	args: T;
	address: Address;
	blockNumber: bigint;
	logIndex: number;
	transactionHash: Hash;
};

export const committeeCreatedEvent: EventDescriptor<CommitteeCreatedEvent> = {
	event: COMMITTEE_CREATED_EVENT,
	schema: committeeCreatedEventSchema,
};

/**
 * Decodes a log entry as delivered by the node and validates it against the
 * descriptor. Throws an {@link EventDecodeError} if the entry is not a mined
 * log of the described event or its arguments do not pass the schema.
 */
export const decodeLog = <T>(descriptor: EventDescriptor<T>, raw: unknown): DecodedLog<T> => {
	const eventName = descriptor.event.name;
	const log = rawLogSchema.safeParse(raw);
	if (!log.success) {
		throw new EventDecodeError(eventName, { cause: log.error });
	}
	const { address, data, topics, blockNumber, logIndex, transactionHash } = log.data;

	let decodedArgs: unknown;
	try {
		decodedArgs = decodeEventLog({
			abi: [descriptor.event],
			data,
			topics,
			strict: true,
		}).args;
	} catch (err) {
		throw new EventDecodeError(eventName, { cause: err, address });
	}

	const args = descriptor.schema.safeParse(decodedArgs);
	if (!args.success) {
		throw new EventDecodeError(eventName, { cause: args.error, address });
	}
	return {
		eventName,
		args: args.data,
		address,
		blockNumber,
		logIndex,
		transactionHash,
	};
};
