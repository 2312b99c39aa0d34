import { Prop, Schema, SchemaFactory } from "@nestjs/mongoose";
import { HydratedDocument } from "mongoose";
import type { BlockAttributes } from "@formblocks/shared-types";

@Schema({ collection: "content_nodes", timestamps: true })
export class ContentNodeEntity {
  @Prop({ required: true, unique: true })
  nodeId!: number;

  @Prop({ required: true, index: true })
  placeholderId!: number;

  @Prop({ type: Number, default: null, index: true })
  parentId!: number | null;

  @Prop({ required: true, default: 0 })
  position!: number;

  @Prop({ required: true })
  blockType!: string;

  @Prop({ type: Object, default: {} })
  attributes!: BlockAttributes;
}

export type ContentNodeDocument = HydratedDocument<ContentNodeEntity>;
export const ContentNodeSchema = SchemaFactory.createForClass(ContentNodeEntity);
ContentNodeSchema.index({ placeholderId: 1, parentId: 1, position: 1 });
