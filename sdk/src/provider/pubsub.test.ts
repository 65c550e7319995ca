import { encodeEventTopics } from "viem";
import { afterEach, describe, expect, it, vi } from "vitest";
import { TEST_BYTECODE, TEST_CHAIN_ID, TestChain } from "../__tests__/chain.js";
import { testLogger } from "../__tests__/config.js";
import { TEST_MANAGER, testMembers } from "../__tests__/data/committee.js";
import { deployKeyManagerContract } from "../contracts/deployer.js";
import { committeeCreatedEvent } from "../contracts/events.js";
import { KeyManagerContract } from "../contracts/keyManager.js";
import { KEY_MANAGER_ABI } from "../types/abis.js";
import { PubSubConnectionError } from "../utils/errors.js";
import { PubSubClient } from "./pubsub.js";

const mocks = vi.hoisted(() => ({
	createPublicClient: vi.fn(),
	webSocket: vi.fn(),
}));

vi.mock("viem", async (importOriginal) => {
	const viem = await importOriginal<typeof import("viem")>();
	return {
		...viem,
		createPublicClient: mocks.createPublicClient,
		webSocket: mocks.webSocket,
	};
});

const setup = async () => {
	const chain = new TestChain();
	const address = await deployKeyManagerContract(chain.deployerClients(), TEST_MANAGER, TEST_BYTECODE, testLogger);
	const contract = new KeyManagerContract(address, chain.keyManagerClients(), testLogger);
	const pubsub = new PubSubClient({ client: chain.pubSubClient(), logger: testLogger });
	return { chain, address, contract, pubsub };
};

describe("PubSubClient", () => {
	afterEach(() => {
		vi.clearAllMocks();
	});

	it("should stream CommitteeCreated events in submission order", async () => {
		const { contract, pubsub, address } = await setup();
		const events = pubsub.eventStream(committeeCreatedEvent, address);

		const base = 1_700_000_000n;
		for (let i = 0; i < 5; i++) {
			await contract.setNextCommittee(base + 1000n * BigInt(i), testMembers(i * 5));
			const next = await events.next();
			expect(next.done).toBe(false);
			expect(next.value?.args.id).toBe(BigInt(i));
			expect(next.value?.blockNumber).toBe(BigInt(3 + i));
			expect(next.value?.address).toBe(address);
		}
		expect(events.pending()).toBe(0);
	});

	it("should subscribe with the contract, the event and the start block", async () => {
		const { chain, pubsub, address } = await setup();
		pubsub.eventStream(committeeCreatedEvent, address);
		pubsub.eventStream(committeeCreatedEvent, address, 2n);
		expect(chain.watchEvent).toBeCalledTimes(2);
		expect(chain.watchEvent).toHaveBeenNthCalledWith(
			1,
			expect.objectContaining({
				address,
				event: committeeCreatedEvent.event,
				fromBlock: undefined,
				strict: false,
			}),
		);
		expect(chain.watchEvent).toHaveBeenNthCalledWith(2, expect.objectContaining({ fromBlock: 2n }));
	});

	it("should replay logs from a concrete start block", async () => {
		const { contract, pubsub, address } = await setup();
		await contract.setNextCommittee(1n, testMembers(0));
		await contract.setNextCommittee(2n, testMembers(5));
		await contract.setNextCommittee(3n, testMembers(10));

		// Committees 1 and 2 were registered in blocks 4 and 5
		const events = pubsub.eventStream(committeeCreatedEvent, address, 4n);
		expect(events.pending()).toBe(2);
		expect((await events.next()).value?.args.id).toBe(1n);
		expect((await events.next()).value?.args.id).toBe(2n);
	});

	it("should drop entries that fail validation and keep streaming", async () => {
		const { chain, contract, pubsub, address } = await setup();
		const events = pubsub.eventStream(committeeCreatedEvent, address);

		await contract.setNextCommittee(1n, testMembers(0));
		const [signature] = encodeEventTopics({ abi: KEY_MANAGER_ABI, eventName: "CommitteeCreated", args: { id: 9n } });
		chain.deliverRaw({
			address,
			data: "0x",
			topics: [signature],
			blockNumber: 3n,
			logIndex: 1,
			transactionHash: "0x",
		});
		chain.deliverRaw({ garbage: true });
		await contract.setNextCommittee(2n, testMembers(5));

		expect(events.pending()).toBe(2);
		expect((await events.next()).value?.args.id).toBe(0n);
		expect((await events.next()).value?.args.id).toBe(1n);
	});

	it("should keep independent streams per subscription", async () => {
		const { chain, contract, pubsub, address } = await setup();
		const first = pubsub.eventStream(committeeCreatedEvent, address);
		const second = pubsub.eventStream(committeeCreatedEvent, address);
		expect(chain.activeWatchers()).toBe(2);

		await contract.setNextCommittee(1n, testMembers(0));
		await first.return();
		expect(chain.activeWatchers()).toBe(1);
		await contract.setNextCommittee(2n, testMembers(5));

		expect(second.pending()).toBe(2);
		expect(await first.next()).toStrictEqual({ done: true, value: undefined });
	});

	it("should keep delivering after a transport error", async () => {
		const { chain, contract, pubsub, address } = await setup();
		const events = pubsub.eventStream(committeeCreatedEvent, address);
		await contract.setNextCommittee(1n, testMembers(0));
		chain.failWatchers(new Error("Test socket closed"));
		await contract.setNextCommittee(2n, testMembers(5));

		expect(chain.activeWatchers()).toBe(1);
		expect(events.isClosed()).toBe(false);
		expect((await events.next()).value?.args.id).toBe(0n);
		expect((await events.next()).value?.args.id).toBe(1n);
	});

	it("should reset the error count when logs arrive", async () => {
		const { chain, contract, address } = await setup();
		const pubsub = new PubSubClient({ client: chain.pubSubClient(), logger: testLogger, maxRetries: 1 });
		const events = pubsub.eventStream(committeeCreatedEvent, address);
		chain.failWatchers(new Error("Test socket closed"));
		await contract.setNextCommittee(1n, testMembers(0));
		chain.failWatchers(new Error("Test socket closed"));

		expect(chain.activeWatchers()).toBe(1);
		expect((await events.next()).value?.args.id).toBe(0n);
	});

	it("should end the stream once the transport gives up", async () => {
		const { chain, contract, address } = await setup();
		const pubsub = new PubSubClient({ client: chain.pubSubClient(), logger: testLogger, maxRetries: 2 });
		const events = pubsub.eventStream(committeeCreatedEvent, address);
		await contract.setNextCommittee(1n, testMembers(0));
		chain.failWatchers(new Error("Test socket closed"));
		chain.failWatchers(new Error("Test socket closed"));
		expect(chain.activeWatchers()).toBe(1);
		const error = new Error("Test reconnect failed");
		chain.failWatchers(error);

		expect(chain.activeWatchers()).toBe(0);
		expect((await events.next()).value?.args.id).toBe(0n);
		await expect(events.next()).rejects.toBe(error);
	});

	it("should forward chain id and block number", async () => {
		const { pubsub } = await setup();
		expect(await pubsub.getChainId()).toBe(TEST_CHAIN_ID);
		expect(await pubsub.getBlockNumber()).toBe(2n);
	});

	it("should close all streams and disconnect", async () => {
		const { chain, address } = await setup();
		const disconnect = vi.fn(async () => {});
		const pubsub = new PubSubClient({ client: chain.pubSubClient(), logger: testLogger, disconnect });
		const first = pubsub.eventStream(committeeCreatedEvent, address);
		const second = pubsub.eventStream(committeeCreatedEvent, address, 0n);

		await pubsub.close();
		await pubsub.close();
		expect(first.isClosed()).toBe(true);
		expect(second.isClosed()).toBe(true);
		expect(chain.activeWatchers()).toBe(0);
		expect(disconnect).toBeCalledTimes(1);
		expect(() => pubsub.eventStream(committeeCreatedEvent, address)).toThrow("PubSub client is closed");
	});

	describe("open", () => {
		it("should connect with the configured reconnect policy", async () => {
			const chain = new TestChain();
			const close = vi.fn();
			mocks.webSocket.mockReturnValueOnce("test-transport");
			mocks.createPublicClient.mockReturnValueOnce({
				getChainId: chain.getChainId,
				transport: { getRpcClient: async () => ({ close }) },
			});

			const pubsub = await PubSubClient.open({ url: "ws://localhost:8546", maxRetries: 3 }, testLogger);
			expect(mocks.webSocket).toBeCalledWith("ws://localhost:8546", {
				reconnect: { attempts: 3, delay: 5_000 },
			});
			expect(mocks.createPublicClient).toBeCalledWith({ transport: "test-transport" });
			expect(chain.getChainId).toBeCalledTimes(1);

			await pubsub.close();
			expect(close).toBeCalledTimes(1);
		});

		it("should fail with PubSubConnectionError when the node is unreachable", async () => {
			const cause = new Error("Test connection refused");
			const close = vi.fn();
			mocks.webSocket.mockReturnValueOnce("test-transport");
			mocks.createPublicClient.mockReturnValueOnce({
				getChainId: vi.fn().mockRejectedValueOnce(cause),
				transport: { getRpcClient: async () => ({ close }) },
			});

			const opening = PubSubClient.open({ url: "ws://localhost:8546" }, testLogger);
			await expect(opening).rejects.toBeInstanceOf(PubSubConnectionError);
			await expect(opening).rejects.toMatchObject({ cause });
			expect(mocks.webSocket).toBeCalledWith("ws://localhost:8546", {
				reconnect: { attempts: 12, delay: 5_000 },
			});
			expect(close).toBeCalledTimes(1);
		});
	});
});
