export * from "./Environment.js";
export * from "./Contract.js";
export * from "./errors.js";
export * from "./interfaces.js";
export * from "./Roles.js";
export * from "./types.js";
export * from "./participation.js";
export * from "./coupon.js";
export * from "./ccip/codec.js";
export * from "./ccip/BaseCCIPContract.js";
export * from "./Ticket.js";
export * from "./PrizeManager.js";
export * from "./TicketManager.js";
export * from "./config.js";
export * from "./protocol.js";
export * from "./mocks/ERC20Mock.js";
export * from "./mocks/ERC721Mock.js";
export * from "./mocks/CCIPRouterMock.js";
export * from "./mocks/CCIPRelay.js";
export * from "./mocks/VRFCoordinatorMock.js";
