/**
 * Storage Module
 *
 * File-backed persistence: the daily match logs and the account links.
 *
 * @module storage
 */

import { Global, Module } from "@nestjs/common";
import { AccountLinkStore } from "./account-link.store";
import { MatchLogStore } from "./match-log.store";

@Global()
@Module({
  providers: [MatchLogStore, AccountLinkStore],
  exports: [MatchLogStore, AccountLinkStore],
})
export class StorageModule {}
