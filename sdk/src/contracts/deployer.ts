import {
	type Account,
	type Address,
	type Chain,
	encodeDeployData,
	encodeFunctionData,
	getAddress,
	type Hex,
	type PublicClient,
	type Transport,
	type WalletClient,
} from "viem";
import type { Logger } from "winston";
import { ERC1967_PROXY_ABI, KEY_MANAGER_ABI } from "../types/abis.js";
import { ContractNotDeployedError, DeploymentSubmissionError, TransactionNotMinedError } from "../utils/errors.js";
import type { KeyManagerBytecode } from "./artifacts.js";

/**
 * The part of a chain connection a deployment needs: submit a transaction and
 * wait for its receipt.
 */
export type DeployerClients = {
	signingClient: Pick<WalletClient<Transport, Chain, Account>, "sendTransaction">;
	publicClient: Pick<PublicClient, "waitForTransactionReceipt">;
};

/**
 * Submits a contract creation transaction and returns the address of the created contract.
 * Nothing is retried; the first failure is reported to the caller.
 */
export const deployContract = async (
	{ signingClient, publicClient }: DeployerClients,
	name: string,
	deployData: Hex,
	logger: Logger,
): Promise<Address> => {
	logger.info(`Deploying ${name}`);
	const txHash = await signingClient.sendTransaction({ data: deployData }).catch((err: unknown) => {
		throw new DeploymentSubmissionError(name, { cause: err });
	});
	logger.info("Waiting for tx to be mined", { contract: name, txHash });

	const receipt = await publicClient.waitForTransactionReceipt({ hash: txHash }).catch((err: unknown) => {
		throw new TransactionNotMinedError(txHash, { cause: err });
	});
	logger.info("Tx mined", {
		contract: name,
		txHash,
		gasUsed: receipt.gasUsed,
		blockNumber: receipt.blockNumber,
	});

	if (receipt.status !== "success" || !receipt.contractAddress) {
		throw new ContractNotDeployedError(name, txHash);
	}
	const address = getAddress(receipt.contractAddress);
	logger.info(`Deployed ${name} at ${address}`, { contract: name, address });
	return address;
};

/**
 * Deploys the KeyManager implementation, then an ERC-1967 proxy pointing at it
 * that calls `initialize(manager)` in its constructor.
 *
 * @returns the proxy address, which is the one to interact with from then on.
 */
export const deployKeyManagerContract = async (
	clients: DeployerClients,
	manager: Address,
	bytecode: KeyManagerBytecode,
	logger: Logger,
): Promise<Address> => {
	const implementation = await deployContract(
		clients,
		"KeyManager",
		encodeDeployData({ abi: KEY_MANAGER_ABI, bytecode: bytecode.keyManager }),
		logger,
	);

	const initData = encodeFunctionData({
		abi: KEY_MANAGER_ABI,
		functionName: "initialize",
		args: [manager],
	});
	const proxy = await deployContract(
		clients,
		"KeyManagerProxy",
		encodeDeployData({
			abi: ERC1967_PROXY_ABI,
			bytecode: bytecode.proxy,
			args: [implementation, initData],
		}),
		logger,
	);
	return proxy;
};
