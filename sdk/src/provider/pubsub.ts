import { type Address, createPublicClient, type PublicClient, type WebSocketTransport, webSocket } from "viem";
import type { Logger } from "winston";
import { type DecodedLog, decodeLog, type EventDescriptor } from "../contracts/events.js";
import type { BlockReference } from "../types/schemas.js";
import { withDefaults } from "../utils/config.js";
import { formatError, PubSubConnectionError } from "../utils/errors.js";
import { EventStream } from "./stream.js";

export type PubSubConfig = {
	url: string;
	maxRetries?: number;
	// Milliseconds between reconnect attempts
	retryInterval?: number;
};

export const DEFAULT_PUBSUB_CONFIG = {
	maxRetries: 12,
	retryInterval: 5_000,
};

export type PubSubReadClient = Pick<
	PublicClient<WebSocketTransport, undefined>,
	"watchEvent" | "getChainId" | "getBlockNumber"
>;

/**
 * Streaming connection to a node, used to follow contract events. Only the
 * calls listed here are forwarded to the underlying client.
 */
export class PubSubClient {
	#client: PubSubReadClient;
	#logger: Logger;
	#disconnect?: () => Promise<void>;
	#maxRetries: number;
	#streams = new Set<{ close(): void }>();
	#closed = false;

	constructor({
		client,
		logger,
		disconnect,
		maxRetries = DEFAULT_PUBSUB_CONFIG.maxRetries,
	}: {
		client: PubSubReadClient;
		logger: Logger;
		disconnect?: () => Promise<void>;
		// Consecutive transport errors tolerated before a stream is ended
		maxRetries?: number;
	}) {
		this.#client = client;
		this.#logger = logger;
		this.#disconnect = disconnect;
		this.#maxRetries = maxRetries;
	}

	/**
	 * Opens a WebSocket connection that reconnects up to `maxRetries` times,
	 * `retryInterval` ms apart. Resolves once the node answered a first request.
	 */
	static async open(config: PubSubConfig, logger: Logger): Promise<PubSubClient> {
		const { url, maxRetries, retryInterval } = withDefaults(config, DEFAULT_PUBSUB_CONFIG);
		const client = createPublicClient({
			transport: webSocket(url, {
				reconnect: { attempts: maxRetries, delay: retryInterval },
			}),
		});
		const disconnect = async () => {
			const rpcClient = await client.transport.getRpcClient();
			rpcClient.close();
		};
		try {
			const chainId = await client.getChainId();
			logger.info("Event pubsub connected", { url, chainId });
		} catch (err) {
			logger.error("Event pubsub failed to start", { url, error: formatError(err) });
			await disconnect().catch((closeErr: unknown) =>
				logger.debug("Could not close socket of failed pubsub", { error: formatError(closeErr) }),
			);
			throw new PubSubConnectionError(url, { cause: err });
		}
		return new PubSubClient({ client, logger, disconnect, maxRetries });
	}

	getChainId(): Promise<number> {
		return this.#client.getChainId();
	}

	getBlockNumber(): Promise<bigint> {
		return this.#client.getBlockNumber();
	}

	/**
	 * Follows one event of one contract. With `"latest"` the node pushes new
	 * logs over the subscription; with a block number logs are polled starting
	 * at that block. Entries that fail decoding are logged and skipped.
	 *
	 * Transport errors are reported while the transport reconnects (or keeps
	 * polling) and resubscribes. The stream only fails once more than
	 * `maxRetries` errors arrived without a log delivered in between.
	 */
	eventStream<T>(
		descriptor: EventDescriptor<T>,
		contract: Address,
		fromBlock: BlockReference = "latest",
	): EventStream<DecodedLog<T>> {
		if (this.#closed) throw Error("PubSub client is closed");
		const eventName = descriptor.event.name;
		const stream: EventStream<DecodedLog<T>> = new EventStream(() => {
			this.#streams.delete(stream);
		});
		this.#streams.add(stream);
		let consecutiveErrors = 0;

		const unwatch = this.#client.watchEvent({
			address: contract,
			event: descriptor.event,
			fromBlock: fromBlock === "latest" ? undefined : fromBlock,
			strict: false,
			onLogs: (logs) => {
				consecutiveErrors = 0;
				for (const log of logs) {
					try {
						stream.push(decodeLog(descriptor, log));
					} catch (err) {
						this.#logger.error(`Failed to parse \`${eventName}\` event log`, { error: formatError(err) });
					}
				}
			},
			onError: (err) => {
				if (stream.isClosed()) return;
				consecutiveErrors++;
				if (consecutiveErrors <= this.#maxRetries) {
					this.#logger.warn("PubSub subscription error, waiting for transport to recover", {
						event: eventName,
						contract,
						attempt: consecutiveErrors,
						error: formatError(err),
					});
					return;
				}
				this.#logger.error("PubSub subscription failed", { event: eventName, contract, error: formatError(err) });
				stream.fail(err);
			},
		});
		stream.attach(unwatch);
		this.#logger.debug("Subscribed to event", { event: eventName, contract, fromBlock });
		return stream;
	}

	/** Ends every open event stream, then closes the connection. */
	async close(): Promise<void> {
		if (this.#closed) return;
		this.#closed = true;
		for (const stream of [...this.#streams]) {
			stream.close();
		}
		await this.#disconnect?.();
	}
}
