/**
 * Storage module exports
 *
 * @module storage
 */

export { StorageModule } from "./storage.module";
export { MatchLogStore } from "./match-log.store";
export { AccountLinkStore } from "./account-link.store";
export type { LinkedAccount, LinkRequest } from "./account-link.store";
