import { Prop, Schema, SchemaFactory } from "@nestjs/mongoose";
import { HydratedDocument } from "mongoose";

@Schema({ collection: "pages", timestamps: true })
export class PageEntity {
  @Prop({ required: true, unique: true })
  pageId!: number;

  @Prop({ required: true })
  path!: string;
}

export type PageDocument = HydratedDocument<PageEntity>;
export const PageSchema = SchemaFactory.createForClass(PageEntity);
