import { Wallet, id, parseEther } from "ethers";
import config from "../raffle.config.js";
import {
  ERC721Mock,
  type CCIPRelay,
  Role,
  deployProtocol,
  requireEnv,
  signTicketCoupon,
} from "../contracts/index.js";

const LINK_FUNDING = parseEther("10");
const TICKET_PRICE = parseEther("0.01");

function deliverPending(relay: CCIPRelay): void {
  for (const result of relay.deliverAll()) {
    if (!result.success) {
      throw new Error(`CCIP message ${result.messageId} failed`, { cause: result.error });
    }
    console.log("Delivered CCIP message:", result.messageId);
  }
}

function main(): void {
  const apiSigner = new Wallet(requireEnv("API_SIGNER_KEY"));
  const deployer = new Wallet(id("raffle-simulation-deployer"));
  const players = [new Wallet(id("raffle-simulation-alice")), new Wallet(id("raffle-simulation-bob"))];
  const from = deployer.address;

  const { prize, tickets, relay } = deployProtocol(config, from);
  const { prizeManager } = prize;
  const { ticketManager, coordinator } = tickets;

  console.log("Deployed contracts:");
  console.log(`PrizeManager (${prize.env.name}):`, prizeManager.address);
  console.log(`TicketManager (${tickets.env.name}):`, ticketManager.address);

  prize.link.mint(prizeManager.address, LINK_FUNDING, { from });
  tickets.link.mint(ticketManager.address, LINK_FUNDING, { from });
  ticketManager.setRole(apiSigner.address, Role.API, true, { from });

  // Prize side: lock an NFT for raffle 1
  const nft = new ERC721Mock(prize.env, from, "Raffle Prize", "PRIZE");
  const tokenId = nft.mint(prizeManager.address, { from }).result;
  prizeManager.lockNFT(ticketManager.address, config.ticketChain.chainSelector, 1n, nft.address, tokenId, { from });
  deliverPending(relay);

  // Ticket side: open the raffle and sell tickets
  const startsAt = tickets.env.time.latest();
  const endsAt = startsAt + 3600n;
  ticketManager.createRaffle(
    1n,
    { startsAt, endsAt, minTicketsThreshold: 1n, maxTicketSupply: 0n, maxHoldings: 0n },
    { from },
  );

  for (const [index, player] of players.entries()) {
    const ticketCount = index + 1;
    const value = TICKET_PRICE * BigInt(ticketCount);
    tickets.env.setBalance(player.address, parseEther("1"));
    const coupon = {
      buyer: player.address,
      nonce: ticketManager.getNonce(player.address),
      raffleId: 1n,
      ticketCount,
      blockNumber: BigInt(tickets.env.block.number + 10),
      value,
    };
    const signature = signTicketCoupon(apiSigner, coupon);
    ticketManager.buyTickets(1n, ticketCount, coupon.blockNumber, signature, { from: player.address, value });
    console.log(`Player ${player.address} bought ${ticketCount} ticket(s)`);
  }

  // Close, draw and propagate
  tickets.env.time.increaseTo(endsAt);
  const requestId = ticketManager.drawWinner(1n, { from }).result;
  coordinator.fulfillRandomWords(requestId, { from });
  const winner = ticketManager.getWinner(1n);
  console.log("Winner drawn:", { requestId: requestId.toString(), winner });

  ticketManager.propagateRaffleWinner(prizeManager.address, config.prizeChain.chainSelector, 1n, { from });
  deliverPending(relay);

  prizeManager.claimPrize(1n, { from: winner });
  console.log("Prize claimed:", {
    nft: nft.address,
    tokenId: tokenId.toString(),
    owner: nft.ownerOf(tokenId),
  });

  const withdrawn = ticketManager.withdrawETH({ from }).result;
  console.log("Ticket proceeds withdrawn:", withdrawn.toString());
}

try {
  main();
} catch (err) {
  console.error(err);
  process.exitCode = 1;
}
