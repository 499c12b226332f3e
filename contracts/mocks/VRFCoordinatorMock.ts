import { getAddress, solidityPackedKeccak256, toBigInt } from "ethers";
import { Contract } from "../Contract.js";
import type { Environment, Overrides, TransactionReceipt } from "../Environment.js";
import { ContractError } from "../errors.js";
import { type IVRFCoordinator, isVRFConsumer } from "../interfaces.js";

interface VRFRequest {
  consumer: string;
  numWords: number;
}

interface CoordinatorState {
  nextRequestId: bigint;
  requests: Map<bigint, VRFRequest>;
}

/**
 * Randomness oracle stand-in. Requests are fulfilled on demand by the test
 * or the simulation; a request may be fulfilled more than once so consumers
 * can be checked against re-delivery.
 */
export class VRFCoordinatorMock extends Contract<CoordinatorState> implements IVRFCoordinator {
  constructor(env: Environment, deployer: string) {
    super(env, deployer, { nextRequestId: 1n, requests: new Map() });
  }

  requestRandomWords(
    keyHash: string,
    subscriptionId: bigint,
    _minimumRequestConfirmations: number,
    _callbackGasLimit: number,
    numWords: number,
    overrides: Overrides,
  ): TransactionReceipt<bigint> {
    return this.execute(overrides, (msg) => {
      if (numWords < 1) throw new ContractError("InvalidNumWords", { numWords });
      const requestId = this.state.nextRequestId;
      this.state.nextRequestId = requestId + 1n;
      this.state.requests.set(requestId, { consumer: msg.sender, numWords });
      this.emit("RandomWordsRequested", { keyHash, requestId, subscriptionId, sender: msg.sender });
      return requestId;
    });
  }

  consumerOf(requestId: bigint): string | undefined {
    return this.state.requests.get(requestId)?.consumer;
  }

  /** Fulfills `requestId` with `words`, or with words derived from the id. */
  fulfillRandomWords(requestId: bigint, overrides: Overrides, words?: bigint[]): TransactionReceipt {
    return this.execute(overrides, () => {
      const request = this.state.requests.get(requestId);
      if (request === undefined) throw new ContractError("NonexistentRequest", { requestId });
      const randomWords = words ?? defaultWords(requestId, request.numWords);
      const consumer = this.env.getContract(request.consumer);
      if (!isVRFConsumer(consumer)) {
        throw new ContractError("InvalidConsumer", { consumer: getAddress(request.consumer) });
      }
      consumer.rawFulfillRandomWords(requestId, randomWords, { from: this.address });
      this.emit("RandomWordsFulfilled", { requestId, success: true });
    });
  }
}

function defaultWords(requestId: bigint, count: number): bigint[] {
  return Array.from({ length: count }, (_, index) =>
    toBigInt(solidityPackedKeccak256(["uint256", "uint256"], [requestId, index])),
  );
}
