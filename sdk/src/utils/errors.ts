import { type Address, BaseError, type Hash } from "viem";

export const formatError = (err: unknown): unknown => {
	if (err instanceof BaseError) {
		// Use .walk() to find an error with a stack trace
		const ground0 = err.walk((err) => !!err && typeof err === "object" && "stack" in err && err.stack !== undefined);

		return {
			message: err.shortMessage || err.message,
			details: err.details || "No additional details",
			name: err.name,
			stack: ground0?.stack,
			// Exclude 'cause' to keep JSON logs single-line
		};
	}

	return err;
};

const asCause = (err: unknown): Error => (err instanceof Error ? err : new Error(String(err)));

export class DeploymentSubmissionError extends BaseError {
	override name = "DeploymentSubmissionError";
	readonly contract: string;

	constructor(contract: string, { cause }: { cause: unknown }) {
		super(`Could not submit deployment of ${contract}.`, { cause: asCause(cause) });
		this.contract = contract;
	}
}

export class TransactionNotMinedError extends BaseError {
	override name = "TransactionNotMinedError";
	readonly transactionHash: Hash;

	constructor(transactionHash: Hash, { cause }: { cause: unknown }) {
		super(`Transaction ${transactionHash} was not mined.`, { cause: asCause(cause) });
		this.transactionHash = transactionHash;
	}
}

export class ContractNotDeployedError extends BaseError {
	override name = "ContractNotDeployedError";
	readonly contract: string;
	readonly transactionHash: Hash;

	constructor(contract: string, transactionHash: Hash) {
		super(`Deployment of ${contract} produced no contract address.`, {
			metaMessages: [`Transaction: ${transactionHash}`],
		});
		this.contract = contract;
		this.transactionHash = transactionHash;
	}
}

export class TransactionRevertedError extends BaseError {
	override name = "TransactionRevertedError";
	readonly transactionHash: Hash;

	constructor(functionName: string, transactionHash: Hash) {
		super(`Call to ${functionName} reverted.`, { metaMessages: [`Transaction: ${transactionHash}`] });
		this.transactionHash = transactionHash;
	}
}

export class PubSubConnectionError extends BaseError {
	override name = "PubSubConnectionError";

	constructor(url: string, { cause }: { cause: unknown }) {
		super(`Could not connect to ${url}.`, { cause: asCause(cause) });
	}
}

export class EventDecodeError extends BaseError {
	override name = "EventDecodeError";
	readonly eventName: string;

	constructor(eventName: string, { cause, address }: { cause: unknown; address?: Address }) {
		super(`Log entry does not match event ${eventName}.`, {
			cause: asCause(cause),
			metaMessages: address !== undefined ? [`Address: ${address}`] : undefined,
		});
		this.eventName = eventName;
	}
}
