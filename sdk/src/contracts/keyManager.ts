import {
	type Account,
	type Address,
	type Chain,
	type Hash,
	isAddressEqual,
	type PublicClient,
	parseEventLogs,
	type Transport,
	type WalletClient,
} from "viem";
import type { Logger } from "winston";
import { KEY_MANAGER_ABI } from "../types/abis.js";
import {
	type Committee,
	type CommitteeMember,
	checkedAddressSchema,
	committeeSchema,
} from "../types/schemas.js";
import { TransactionRevertedError } from "../utils/errors.js";

export type KeyManagerClients = {
	publicClient: Pick<PublicClient, "readContract" | "waitForTransactionReceipt">;
	signingClient?: Pick<WalletClient<Transport, Chain, Account>, "writeContract">;
};

export type CommitteeRegistration = {
	transactionHash: Hash;
	blockNumber: bigint;
	committeeId: bigint;
};

export class KeyManagerContract {
	#address: Address;
	#publicClient: KeyManagerClients["publicClient"];
	#signingClient?: KeyManagerClients["signingClient"];
	#logger: Logger;

	constructor(address: Address, { publicClient, signingClient }: KeyManagerClients, logger: Logger) {
		this.#address = address;
		this.#publicClient = publicClient;
		this.#signingClient = signingClient;
		this.#logger = logger;
	}

	address(): Address {
		return this.#address;
	}

	async manager(): Promise<Address> {
		const manager = await this.#publicClient.readContract({
			address: this.#address,
			abi: KEY_MANAGER_ABI,
			functionName: "manager",
		});
		return checkedAddressSchema.parse(manager);
	}

	async getCommitteeById(id: bigint): Promise<Committee> {
		const committee = await this.#publicClient.readContract({
			address: this.#address,
			abi: KEY_MANAGER_ABI,
			functionName: "getCommitteeById",
			args: [id],
		});
		return committeeSchema.parse(committee);
	}

	/**
	 * Registers the next committee and waits until the transaction is mined.
	 * The returned id is taken from the `CommitteeCreated` log of the receipt.
	 */
	async setNextCommittee(effectiveTimestamp: bigint, members: CommitteeMember[]): Promise<CommitteeRegistration> {
		if (this.#signingClient === undefined) {
			throw Error(`KeyManager handle for ${this.#address} is read only`);
		}
		const transactionHash = await this.#signingClient.writeContract({
			address: this.#address,
			abi: KEY_MANAGER_ABI,
			functionName: "setNextCommittee",
			args: [effectiveTimestamp, members],
		});
		this.#logger.debug("Submitted next committee", { transactionHash, members: members.length });

		const receipt = await this.#publicClient.waitForTransactionReceipt({ hash: transactionHash });
		if (receipt.status !== "success") {
			throw new TransactionRevertedError("setNextCommittee", transactionHash);
		}
		const [created] = parseEventLogs({
			abi: KEY_MANAGER_ABI,
			eventName: "CommitteeCreated",
			logs: receipt.logs.filter((log) => isAddressEqual(log.address, this.#address)),
		});
		if (created === undefined) {
			throw Error(`Transaction ${transactionHash} emitted no CommitteeCreated event`);
		}
		this.#logger.info("Registered committee", {
			committeeId: created.args.id,
			effectiveTimestamp,
			blockNumber: receipt.blockNumber,
		});
		return {
			transactionHash,
			blockNumber: receipt.blockNumber,
			committeeId: created.args.id,
		};
	}
}
