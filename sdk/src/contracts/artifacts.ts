import { readFileSync } from "node:fs";
import path from "node:path";
import type { Hex } from "viem";
import { z } from "zod";
import { hexDataSchema } from "../types/schemas.js";

// Subset of a Foundry build artifact (`out/<Name>.sol/<Name>.json`)
const forgeArtifactSchema = z.object({
	bytecode: z.object({
		object: hexDataSchema,
	}),
});

export type KeyManagerBytecode = {
	keyManager: Hex;
	proxy: Hex;
};

export const artifactPath = (artifactsDir: string, contractName: string): string =>
	path.join(artifactsDir, `${contractName}.sol`, `${contractName}.json`);

export const loadBytecode = (artifactsDir: string, contractName: string): Hex => {
	const file = artifactPath(artifactsDir, contractName);
	const artifact = forgeArtifactSchema.parse(JSON.parse(readFileSync(file, "utf8")));
	if (artifact.bytecode.object === "0x") {
		throw Error(`Artifact ${file} has no creation bytecode (abstract contract or interface?)`);
	}
	return artifact.bytecode.object;
};

export const loadKeyManagerBytecode = (artifactsDir: string): KeyManagerBytecode => ({
	keyManager: loadBytecode(artifactsDir, "KeyManager"),
	proxy: loadBytecode(artifactsDir, "ERC1967Proxy"),
});
