import dotenv from "dotenv";
import { committeeCreatedEvent } from "../contracts/events.js";
import { KeyManagerContract } from "../contracts/keyManager.js";
import { buildPublicClient } from "../provider/clients.js";
import { PubSubClient } from "../provider/pubsub.js";
import { watchConfigSchema } from "../types/schemas.js";
import { formatError } from "../utils/errors.js";
import { createLogger } from "../utils/logging.js";

dotenv.config({ quiet: true });

const logger = createLogger({ pretty: true });

const main = async (): Promise<void> => {
	const config = watchConfigSchema.parse(process.env);
	const keyManager = new KeyManagerContract(
		config.KEY_MANAGER_ADDRESS,
		{ publicClient: buildPublicClient(config.RPC_URL, config.CHAIN_ID) },
		logger,
	);
	const pubsub = await PubSubClient.open(
		{
			url: config.WS_URL,
			maxRetries: config.MAX_RETRIES,
			retryInterval: config.RETRY_INTERVAL_MS,
		},
		logger,
	);
	const stop = () => {
		pubsub.close().catch((err: unknown) => logger.error("Failed to close pubsub", { error: formatError(err) }));
	};
	process.once("SIGINT", stop);
	process.once("SIGTERM", stop);

	const events = pubsub.eventStream(committeeCreatedEvent, config.KEY_MANAGER_ADDRESS, config.FROM_BLOCK);
	try {
		for await (const event of events) {
			const committee = await keyManager.getCommitteeById(event.args.id);
			logger.info(`Committee ${event.args.id} created`, {
				blockNumber: event.blockNumber,
				transactionHash: event.transactionHash,
				effectiveTimestamp: committee.effectiveTimestamp,
				members: committee.members.map((member) => ({
					sigKeyAddress: member.sigKeyAddress,
					networkAddress: member.networkAddress,
				})),
			});
		}
	} finally {
		await pubsub.close();
	}
};

main().catch((err: unknown) => {
	logger.error("Committee watcher stopped", { error: formatError(err) });
	process.exitCode = 1;
});
