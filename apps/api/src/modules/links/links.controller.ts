/**
 * Links Controller - REST API endpoints for account links
 *
 * Endpoints:
 * - PUT    /v1/links/:userId - Link (or relink) a Riot account
 * - DELETE /v1/links/:userId - Remove a link
 * - GET    /v1/links/:userId - Get a user's link
 * - GET    /v1/links         - List links, optionally of one guild
 */

import { Body, Controller, Delete, Get, Param, Put, Query } from "@nestjs/common";
import { ApiOperation, ApiResponse, ApiTags } from "@nestjs/swagger";
import type { AccountLink } from "@spike-stats/types";
import type { LinkedAccount } from "../storage/account-link.store";
import { LinkAccountDto, ListLinksQueryDto, UserIdParamsDto } from "./dto/links.dto";
import { LinksService } from "./links.service";

@ApiTags("links")
@Controller({ path: "links", version: "1" })
export class LinksController {
  constructor(private readonly linksService: LinksService) {}

  @Put(":userId")
  @ApiOperation({ summary: "Link a Riot account to a user" })
  async link(
    @Param() params: UserIdParamsDto,
    @Body() body: LinkAccountDto,
  ): Promise<AccountLink> {
    return this.linksService.link(params.userId, body);
  }

  @Delete(":userId")
  @ApiOperation({ summary: "Remove a user's linked account" })
  @ApiResponse({ status: 404, description: "User has no linked account" })
  async unlink(@Param() params: UserIdParamsDto): Promise<AccountLink> {
    return this.linksService.unlink(params.userId);
  }

  @Get(":userId")
  @ApiOperation({ summary: "Get a user's linked account" })
  @ApiResponse({ status: 404, description: "User has no linked account" })
  async getLink(@Param() params: UserIdParamsDto): Promise<AccountLink> {
    return this.linksService.getLink(params.userId);
  }

  @Get()
  @ApiOperation({ summary: "List linked accounts" })
  async listLinks(@Query() query: ListLinksQueryDto): Promise<LinkedAccount[]> {
    return this.linksService.listLinks(query.guildId);
  }
}
