// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import { z } from "zod";
import {
  ListTagsForResourceCommand,
  TagResourceCommand,
  UntagResourceCommand,
} from "@aws-sdk/client-healthlake";
import { beginCall, beginMutation, regionName, withoutMetadata, type ToolContext } from "./context.js";
import { withErrorHandling } from "./errors.js";

export const tagList = z.array(z.object({ Key: z.string().min(1), Value: z.string() }));

const resourceArn = z.string().min(1).describe("The Amazon Resource Name (ARN) of the resource");

export const TagResourceInputSchema = z.object({
  resource_arn: resourceArn,
  tags: tagList.min(1).describe("Tags to add to the resource"),
  region_name: regionName,
});

export const UntagResourceInputSchema = z.object({
  resource_arn: resourceArn,
  tag_keys: z.array(z.string().min(1)).min(1).describe("Tag keys to remove from the resource"),
  region_name: regionName,
});

export const ListTagsInputSchema = z.object({
  resource_arn: resourceArn,
  region_name: regionName,
});

export async function tagResource(ctx: ToolContext, args: z.infer<typeof TagResourceInputSchema>) {
  return withErrorHandling("tag_resource", async () => {
    const call = beginMutation(ctx, args.region_name);
    const output = await ctx.controlPlane(call.region).send(
      new TagResourceCommand({ ResourceARN: args.resource_arn, Tags: args.tags }),
    );
    return withoutMetadata("tag_resource", output);
  });
}

export async function untagResource(ctx: ToolContext, args: z.infer<typeof UntagResourceInputSchema>) {
  return withErrorHandling("untag_resource", async () => {
    const call = beginMutation(ctx, args.region_name);
    const output = await ctx.controlPlane(call.region).send(
      new UntagResourceCommand({ ResourceARN: args.resource_arn, TagKeys: args.tag_keys }),
    );
    return withoutMetadata("untag_resource", output);
  });
}

export async function listTagsForResource(ctx: ToolContext, args: z.infer<typeof ListTagsInputSchema>) {
  return withErrorHandling("list_tags_for_resource", async () => {
    const call = beginCall(ctx, args.region_name);
    const output = await ctx.controlPlane(call.region).send(
      new ListTagsForResourceCommand({ ResourceARN: args.resource_arn }),
    );
    return withoutMetadata("list_tags_for_resource", output);
  });
}
