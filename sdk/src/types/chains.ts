import { type Chain, extractChain } from "viem";
import { anvil, arbitrum, arbitrumSepolia, mainnet, sepolia } from "viem/chains";

export const supportedChains: readonly Chain[] = [anvil, mainnet, sepolia, arbitrum, arbitrumSepolia];

export const getChain = (chainId: number): Chain => {
	const chain: Chain | undefined = extractChain({
		chains: supportedChains,
		id: chainId,
	});
	if (chain === undefined) throw Error(`Unsupported chain id ${chainId}`);
	return chain;
};
