import dotenv from "dotenv";
import { loadKeyManagerBytecode } from "../contracts/artifacts.js";
import { deployKeyManagerContract } from "../contracts/deployer.js";
import { buildPublicClient, buildSigningClient } from "../provider/clients.js";
import { deployConfigSchema } from "../types/schemas.js";
import { formatError } from "../utils/errors.js";
import { createLogger } from "../utils/logging.js";

dotenv.config({ quiet: true });

const logger = createLogger({ pretty: true });

const main = async (): Promise<void> => {
	const config = deployConfigSchema.parse(process.env);

	const signingClient = buildSigningClient({
		mnemonic: config.MNEMONIC,
		accountIndex: config.ACCOUNT_INDEX,
		rpcUrl: config.RPC_URL,
		chainId: config.CHAIN_ID,
	});
	const publicClient = buildPublicClient(config.RPC_URL, config.CHAIN_ID);
	logger.info(`Deploying KeyManager on ${signingClient.chain.name}`, {
		manager: config.MANAGER_ADDRESS,
		deployer: signingClient.account.address,
		rpcUrl: config.RPC_URL,
	});

	const bytecode = loadKeyManagerBytecode(config.ARTIFACTS_DIR);
	const proxy = await deployKeyManagerContract(
		{ signingClient, publicClient },
		config.MANAGER_ADDRESS,
		bytecode,
		logger,
	);
	logger.info(`KeyManager proxy deployed at ${proxy}`);
};

main().catch((err: unknown) => {
	logger.error("Deployment failed", { error: formatError(err) });
	process.exitCode = 1;
});
