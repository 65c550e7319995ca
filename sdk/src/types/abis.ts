import { parseAbi, parseAbiItem } from "viem";

export const KEY_MANAGER_ABI = parseAbi([
	"struct CommitteeMember { bytes sigKey; bytes dhKey; bytes dkgKey; string networkAddress; string batchPosterAddress; address sigKeyAddress; }",
	"struct Committee { uint64 id; uint256 registeredBlockNumber; uint64 effectiveTimestamp; CommitteeMember[] members; }",
	"function initialize(address initialManager)",
	"function manager() view returns (address)",
	"function setNextCommittee(uint64 effectiveTimestamp, CommitteeMember[] members)",
	"function getCommitteeById(uint64 id) view returns (Committee committee)",
	"event CommitteeCreated(uint64 indexed id)",
]);

export const COMMITTEE_CREATED_EVENT = parseAbiItem("event CommitteeCreated(uint64 indexed id)");

export const ERC1967_PROXY_ABI = parseAbi([
	"constructor(address implementation, bytes _data) payable",
	"event Upgraded(address indexed implementation)",
]);
