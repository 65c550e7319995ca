import {
	type Account,
	type Chain,
	createPublicClient,
	createWalletClient,
	http,
	type PublicClient,
	type Transport,
	type WalletClient,
} from "viem";
import { mnemonicToAccount } from "viem/accounts";
import { getChain } from "../types/chains.js";

export type SigningClient = WalletClient<Transport, Chain, Account>;

export type SignerCredentials = {
	mnemonic: string;
	accountIndex: number;
};

/** Derives the account at `m/44'/60'/0'/0/<accountIndex>` of the mnemonic. */
export const buildSigner = ({ mnemonic, accountIndex }: SignerCredentials): Account =>
	mnemonicToAccount(mnemonic.trim(), { addressIndex: accountIndex });

/** Signing client for an account that already exists (e.g. a private key or hardware wallet). */
export const buildWalletClient = (account: Account, rpcUrl: string, chainId: number): SigningClient => {
	const chain: Chain = getChain(chainId);
	return createWalletClient({
		account,
		chain,
		transport: http(rpcUrl),
	});
};

export const buildSigningClient = ({
	rpcUrl,
	chainId,
	...credentials
}: SignerCredentials & { rpcUrl: string; chainId: number }): SigningClient =>
	buildWalletClient(buildSigner(credentials), rpcUrl, chainId);

/** Read only client over HTTP. */
export const buildPublicClient = (rpcUrl: string, chainId: number): PublicClient => {
	const chain: Chain = getChain(chainId);
	return createPublicClient({
		chain,
		transport: http(rpcUrl),
	});
};
