/**
 * Shared test fixtures and utilities for the raffle tests
 *
 * Every fixture builds a fresh pair of chains, so suites never share state.
 */
import { type BaseWallet, Wallet, ZeroHash, id } from "ethers";
import { expect } from "chai";
import {
  type CCIPRelay,
  type DeliveryResult,
  ERC20Mock,
  ERC721Mock,
  type Environment,
  type RaffleConfig,
  type RaffleParams,
  Role,
  defineConfig,
  deployProtocol,
  encodeAddress,
  signTicketCoupon,
  type TransactionReceipt,
  type PrizeManager,
  type TicketManager,
  type Ticket,
  type CCIPRouterMock,
  type VRFCoordinatorMock,
} from "../../contracts/index.js";
import {
  ACCOUNT_FUNDING,
  CCIP_BASE_FEE,
  CCIP_FEE_PER_BYTE,
  COUPON_VALIDITY_BLOCKS,
  LINK_FUNDING,
  ONE_HOUR,
  PRIZE_CHAIN_SELECTOR,
  TICKET_CHAIN_SELECTOR,
  VRF_KEY_HASH,
} from "./types.js";

// =============================================================================
// FIXTURE TYPES
// =============================================================================

export interface TestContext {
  config: RaffleConfig;
  deployer: BaseWallet;
  apiSigner: BaseWallet;
  alice: BaseWallet;
  bob: BaseWallet;
  charlie: BaseWallet;
  relayer: BaseWallet;
  prizeEnv: Environment;
  ticketEnv: Environment;
  prizeLink: ERC20Mock;
  ticketLink: ERC20Mock;
  prizeRouter: CCIPRouterMock;
  ticketRouter: CCIPRouterMock;
  relay: CCIPRelay;
  coordinator: VRFCoordinatorMock;
  ticket: Ticket;
  prizeManager: PrizeManager;
  ticketManager: TicketManager;
  nft: ERC721Mock;
  token: ERC20Mock;
}

export function wallet(label: string): BaseWallet {
  return new Wallet(id(`raffle-test-${label}`));
}

// =============================================================================
// FIXTURES
// =============================================================================

/**
 * Deploy both chains and leave them ready for prize locking
 *
 * Setup includes:
 * - Prize and Ticket managers linked as CCIP counterparts
 * - Both managers funded with LINK for router fees
 * - API signer granted role 1 on the Ticket manager
 * - An NFT collection and an ERC-20 prize token on the prize chain
 * - Every account funded with native currency on both chains
 */
export function deployProtocolFixture(): TestContext {
  const deployer = wallet("deployer");
  const apiSigner = wallet("api");
  const alice = wallet("alice");
  const bob = wallet("bob");
  const charlie = wallet("charlie");
  const relayer = wallet("relayer");

  const config = defineConfig(
    {
      prizeChain: { name: "prize-chain", chainSelector: PRIZE_CHAIN_SELECTOR },
      ticketChain: { name: "ticket-chain", chainSelector: TICKET_CHAIN_SELECTOR },
      ccip: { baseFee: CCIP_BASE_FEE, feePerByte: CCIP_FEE_PER_BYTE, extraArgs: "0x" },
      vrf: { keyHash: VRF_KEY_HASH, subscriptionId: 1n },
    },
    {},
  );

  const { prize, tickets, relay } = deployProtocol(config, deployer.address, relayer.address);
  const from = deployer.address;

  prize.link.mint(prize.prizeManager.address, LINK_FUNDING, { from });
  tickets.link.mint(tickets.ticketManager.address, LINK_FUNDING, { from });
  tickets.ticketManager.setRole(apiSigner.address, Role.API, true, { from });

  const nft = new ERC721Mock(prize.env, from, "Prize Collection", "PRIZE");
  const token = new ERC20Mock(prize.env, from, "Prize Token", "PRZ");

  for (const account of [deployer, alice, bob, charlie]) {
    prize.env.setBalance(account.address, ACCOUNT_FUNDING);
    tickets.env.setBalance(account.address, ACCOUNT_FUNDING);
  }

  return {
    config,
    deployer,
    apiSigner,
    alice,
    bob,
    charlie,
    relayer,
    prizeEnv: prize.env,
    ticketEnv: tickets.env,
    prizeLink: prize.link,
    ticketLink: tickets.link,
    prizeRouter: prize.router,
    ticketRouter: tickets.router,
    relay,
    coordinator: tickets.coordinator,
    ticket: tickets.ticket,
    prizeManager: prize.prizeManager,
    ticketManager: tickets.ticketManager,
    nft,
    token,
  };
}

// =============================================================================
// CROSS-CHAIN HELPERS
// =============================================================================

/**
 * Deliver every pending message and fail the test on any revert
 */
export function deliverAll(ctx: TestContext): TransactionReceipt[] {
  return ctx.relay.deliverAll().map((result) => {
    if (!result.success) {
      throw new Error(`Delivery of ${result.messageId} failed: ${String(result.error)}`);
    }
    return result.receipt;
  });
}

/**
 * Hand a message to the Prize manager as its router, bypassing the relay
 */
export function receiveOnPrizeSide(
  ctx: TestContext,
  data: string,
  sender: string = ctx.ticketManager.address,
  sourceChainSelector: bigint = TICKET_CHAIN_SELECTOR,
): TransactionReceipt {
  return ctx.prizeManager.ccipReceive(
    { messageId: ZeroHash, sourceChainSelector, sender: encodeAddress(sender), data, destTokenAmounts: [] },
    { from: ctx.prizeRouter.address },
  );
}

/**
 * Hand a message to the Ticket manager as its router, bypassing the relay
 */
export function receiveOnTicketSide(
  ctx: TestContext,
  data: string,
  sender: string = ctx.prizeManager.address,
  sourceChainSelector: bigint = PRIZE_CHAIN_SELECTOR,
): TransactionReceipt {
  return ctx.ticketManager.ccipReceive(
    { messageId: ZeroHash, sourceChainSelector, sender: encodeAddress(sender), data, destTokenAmounts: [] },
    { from: ctx.ticketRouter.address },
  );
}

/**
 * Id of the most recent message sent from the given router
 */
export function lastMessageId(router: CCIPRouterMock): string {
  const sent = router.sentMessages();
  const last = sent[sent.length - 1];
  if (last === undefined) throw new Error("No message sent");
  return last.messageId;
}

// =============================================================================
// PRIZE HELPERS
// =============================================================================

/**
 * Mint an NFT to the Prize manager, lock it for `raffleId` and deliver the
 * prize-locked message
 */
export function lockNFTPrize(ctx: TestContext, raffleId: bigint): bigint {
  const from = ctx.deployer.address;
  const tokenId = ctx.nft.mint(ctx.prizeManager.address, { from }).result;
  ctx.prizeManager.lockNFT(ctx.ticketManager.address, TICKET_CHAIN_SELECTOR, raffleId, ctx.nft.address, tokenId, {
    from,
  });
  deliverAll(ctx);
  return tokenId;
}

/**
 * Send `amount` along with the lock call and deliver the prize-locked message
 */
export function lockETHPrize(ctx: TestContext, raffleId: bigint, amount: bigint): void {
  ctx.prizeManager.lockETH(ctx.ticketManager.address, TICKET_CHAIN_SELECTOR, raffleId, amount, {
    from: ctx.deployer.address,
    value: amount,
  });
  deliverAll(ctx);
}

/**
 * Mint `amount` prize tokens to the Prize manager, lock them and deliver
 */
export function lockTokenPrize(ctx: TestContext, raffleId: bigint, amount: bigint): void {
  const from = ctx.deployer.address;
  ctx.token.mint(ctx.prizeManager.address, amount, { from });
  ctx.prizeManager.lockTokens(ctx.ticketManager.address, TICKET_CHAIN_SELECTOR, raffleId, ctx.token.address, amount, {
    from,
  });
  deliverAll(ctx);
}

// =============================================================================
// RAFFLE LIFECYCLE HELPERS
// =============================================================================

/**
 * Open a prize-locked raffle starting now and closing in one hour
 */
export function createRaffle(ctx: TestContext, raffleId: bigint, params: Partial<RaffleParams> = {}): RaffleParams {
  const now = ctx.ticketEnv.time.latest();
  const resolved: RaffleParams = {
    startsAt: now,
    endsAt: now + ONE_HOUR,
    minTicketsThreshold: 0n,
    maxTicketSupply: 0n,
    maxHoldings: 0n,
    ...params,
  };
  ctx.ticketManager.createRaffle(raffleId, resolved, { from: ctx.deployer.address });
  return resolved;
}

export interface Coupon {
  blockNumber: bigint;
  signature: string;
}

/**
 * Coupon signed by the API signer for the buyer's next purchase
 */
export function signCoupon(
  ctx: TestContext,
  buyer: BaseWallet,
  raffleId: bigint,
  ticketCount: number,
  value: bigint,
  signer: BaseWallet = ctx.apiSigner,
): Coupon {
  const blockNumber = BigInt(ctx.ticketEnv.block.number) + COUPON_VALIDITY_BLOCKS;
  const signature = signTicketCoupon(signer, {
    buyer: buyer.address,
    nonce: ctx.ticketManager.getNonce(buyer.address),
    raffleId,
    ticketCount,
    blockNumber,
    value,
  });
  return { blockNumber, signature };
}

/**
 * Buy tickets with a freshly signed coupon
 */
export function buyTickets(
  ctx: TestContext,
  buyer: BaseWallet,
  raffleId: bigint,
  ticketCount: number,
  value: bigint,
): TransactionReceipt {
  const { blockNumber, signature } = signCoupon(ctx, buyer, raffleId, ticketCount, value);
  return ctx.ticketManager.buyTickets(raffleId, ticketCount, blockNumber, signature, {
    from: buyer.address,
    value,
  });
}

/**
 * Advance ticket-chain time so the latest block is past `endsAt`
 */
export function advancePastEnd(ctx: TestContext, endsAt: bigint): void {
  if (ctx.ticketEnv.time.latest() <= endsAt) {
    ctx.ticketEnv.time.increaseTo(endsAt + 1n);
  }
}

/**
 * Draw and fulfill the randomness request with a chosen word
 */
export function drawWithWord(ctx: TestContext, raffleId: bigint, randomWord: bigint): bigint {
  const from = ctx.deployer.address;
  const requestId = ctx.ticketManager.drawWinner(raffleId, { from }).result;
  ctx.coordinator.fulfillRandomWords(requestId, { from }, [randomWord]);
  return requestId;
}

/**
 * Propagate the winner to the prize chain and deliver the message
 */
export function propagateWinner(ctx: TestContext, raffleId: bigint): string {
  ctx.ticketManager.propagateRaffleWinner(ctx.prizeManager.address, PRIZE_CHAIN_SELECTOR, raffleId, {
    from: ctx.deployer.address,
  });
  deliverAll(ctx);
  return ctx.prizeManager.getWinner(raffleId);
}

/**
 * Cancel the raffle on the ticket chain and deliver the message
 */
export function cancelRaffle(ctx: TestContext, raffleId: bigint): void {
  ctx.ticketManager.cancelRaffle(ctx.prizeManager.address, PRIZE_CHAIN_SELECTOR, raffleId, {
    from: ctx.deployer.address,
  });
  deliverAll(ctx);
}

// =============================================================================
// ASSERTION HELPERS
// =============================================================================

/**
 * Expect a call to revert with a specific error
 */
export function expectRevert(call: () => unknown, errorName: string): void {
  let reverted = false;
  try {
    call();
  } catch (err) {
    reverted = true;
    const errorStr = String(err);
    if (!errorStr.includes(errorName)) {
      throw new Error(`Expected error "${errorName}" but got: ${errorStr}`);
    }
  }
  expect(reverted, `Expected revert with ${errorName}`).to.equal(true);
}

/**
 * Expect a relayed delivery to have failed with a specific error
 */
export function expectFailedDelivery(result: DeliveryResult | undefined, errorName: string): void {
  expect(result?.success).to.equal(false);
  if (result === undefined || result.success) return;
  expect(String(result.error)).to.include(errorName);
}
