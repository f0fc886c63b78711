import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

@Schema({ timestamps: true })
export class BoardConfig {
  @Prop({ required: true, unique: true, min: 0x20, max: 0x27 })
  boardAddress!: number;

  @Prop({ default: 0xff, min: 0, max: 0xff })
  directionA!: number;

  @Prop({ default: 0xff, min: 0, max: 0xff })
  directionB!: number;
}

export type BoardConfigDocument = HydratedDocument<BoardConfig>;

export const BoardConfigSchema = SchemaFactory.createForClass(BoardConfig);
