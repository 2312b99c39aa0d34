import { Prop, Schema, SchemaFactory } from "@nestjs/mongoose";
import { HydratedDocument } from "mongoose";

@Schema({ collection: "field_options" })
export class FieldOptionEntity {
  @Prop({ required: true, unique: true })
  optionId!: number;

  @Prop({ required: true, index: true })
  fieldId!: number;

  @Prop({ required: true })
  value!: string;

  @Prop({ required: true, default: 0 })
  position!: number;
}

export type FieldOptionDocument = HydratedDocument<FieldOptionEntity>;
export const FieldOptionSchema = SchemaFactory.createForClass(FieldOptionEntity);
