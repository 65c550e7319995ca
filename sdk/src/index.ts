export { artifactPath, type KeyManagerBytecode, loadBytecode, loadKeyManagerBytecode } from "./contracts/artifacts.js";
export { committeeMembersEqual, committeesEqual } from "./contracts/committee.js";
export { type DeployerClients, deployContract, deployKeyManagerContract } from "./contracts/deployer.js";
export { committeeCreatedEvent, type DecodedLog, decodeLog, type EventDescriptor } from "./contracts/events.js";
export { type CommitteeRegistration, type KeyManagerClients, KeyManagerContract } from "./contracts/keyManager.js";
export {
	buildPublicClient,
	buildSigner,
	buildSigningClient,
	buildWalletClient,
	type SignerCredentials,
	type SigningClient,
} from "./provider/clients.js";
export { DEFAULT_PUBSUB_CONFIG, PubSubClient, type PubSubConfig, type PubSubReadClient } from "./provider/pubsub.js";
export { EventStream } from "./provider/stream.js";
export { COMMITTEE_CREATED_EVENT, ERC1967_PROXY_ABI, KEY_MANAGER_ABI } from "./types/abis.js";
export { getChain, supportedChains } from "./types/chains.js";
export {
	type BlockReference,
	type Committee,
	type CommitteeCreatedEvent,
	type CommitteeMember,
	checkedAddressSchema,
	committeeMemberSchema,
	committeeSchema,
} from "./types/schemas.js";
export {
	ContractNotDeployedError,
	DeploymentSubmissionError,
	EventDecodeError,
	formatError,
	PubSubConnectionError,
	TransactionNotMinedError,
	TransactionRevertedError,
} from "./utils/errors.js";
export { createLogger, type LoggingOptions, type LogLevel } from "./utils/logging.js";
