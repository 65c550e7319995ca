import { type Hex, isAddressEqual } from "viem";
import type { Committee, CommitteeMember } from "../types/schemas.js";

const sameBytes = (a: Hex, b: Hex): boolean => a.toLowerCase() === b.toLowerCase();

export const committeeMembersEqual = (a: CommitteeMember, b: CommitteeMember): boolean =>
	sameBytes(a.sigKey, b.sigKey) &&
	sameBytes(a.dhKey, b.dhKey) &&
	sameBytes(a.dkgKey, b.dkgKey) &&
	a.networkAddress === b.networkAddress &&
	a.batchPosterAddress === b.batchPosterAddress &&
	isAddressEqual(a.sigKeyAddress, b.sigKeyAddress);

export const committeesEqual = (a: Committee, b: Committee): boolean =>
	a.id === b.id &&
	a.registeredBlockNumber === b.registeredBlockNumber &&
	a.effectiveTimestamp === b.effectiveTimestamp &&
	a.members.length === b.members.length &&
	a.members.every((member, i) => {
		const other = b.members[i];
		return other !== undefined && committeeMembersEqual(member, other);
	});
