import { getAddress } from "ethers";
import type { RaffleConfig } from "./config.js";
import { Environment } from "./Environment.js";
import { PrizeManager } from "./PrizeManager.js";
import { Role } from "./Roles.js";
import { Ticket } from "./Ticket.js";
import { TicketManager } from "./TicketManager.js";
import { CCIPRelay } from "./mocks/CCIPRelay.js";
import { CCIPRouterMock } from "./mocks/CCIPRouterMock.js";
import { ERC20Mock } from "./mocks/ERC20Mock.js";
import { VRFCoordinatorMock } from "./mocks/VRFCoordinatorMock.js";

export interface PrizeChain {
  env: Environment;
  link: ERC20Mock;
  router: CCIPRouterMock;
  prizeManager: PrizeManager;
}

export interface TicketChain {
  env: Environment;
  link: ERC20Mock;
  router: CCIPRouterMock;
  coordinator: VRFCoordinatorMock;
  ticket: Ticket;
  ticketManager: TicketManager;
}

export interface Protocol {
  prize: PrizeChain;
  tickets: TicketChain;
  relay: CCIPRelay;
}

/**
 * Deploys both chains with their collaborators and links the two managers as
 * each other's only CCIP counterpart. `deployer` ends up admin of both
 * managers; `config.admin`, when set, is granted the admin role as well.
 */
export function deployProtocol(config: RaffleConfig, deployer: string, relayOperator: string = deployer): Protocol {
  const from = getAddress(deployer);

  const prizeEnv = new Environment({ ...config.prizeChain });
  const prizeLink = new ERC20Mock(prizeEnv, from, "ChainLink Token", "LINK");
  const prizeRouter = new CCIPRouterMock(prizeEnv, from, prizeLink, config.ccip);
  const prizeManager = new PrizeManager(prizeEnv, from, { router: prizeRouter, link: prizeLink });

  const ticketEnv = new Environment({ ...config.ticketChain });
  const ticketLink = new ERC20Mock(ticketEnv, from, "ChainLink Token", "LINK");
  const ticketRouter = new CCIPRouterMock(ticketEnv, from, ticketLink, config.ccip);
  const coordinator = new VRFCoordinatorMock(ticketEnv, from);
  const ticket = new Ticket(ticketEnv, from);
  const ticketManager = new TicketManager(ticketEnv, from, {
    router: ticketRouter,
    link: ticketLink,
    ticket,
    coordinator,
    vrf: config.vrf,
  });

  ticket.initializeManager(ticketManager.address, { from });
  prizeManager.setCCIPCounterpart(ticketManager.address, config.ticketChain.chainSelector, true, { from });
  ticketManager.setCCIPCounterpart(prizeManager.address, config.prizeChain.chainSelector, true, { from });
  if (config.ccip.extraArgs !== "0x") {
    prizeManager.setCCIPExtraArgs(config.ccip.extraArgs, { from });
    ticketManager.setCCIPExtraArgs(config.ccip.extraArgs, { from });
  }
  if (config.admin !== undefined) {
    prizeManager.setRole(config.admin, Role.ADMIN, true, { from });
    ticketManager.setRole(config.admin, Role.ADMIN, true, { from });
  }

  const relay = new CCIPRelay(relayOperator).connect(prizeRouter, ticketRouter);

  return {
    prize: { env: prizeEnv, link: prizeLink, router: prizeRouter, prizeManager },
    tickets: { env: ticketEnv, link: ticketLink, router: ticketRouter, coordinator, ticket, ticketManager },
    relay,
  };
}
