import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';

import { AbstractSchema } from '../../../../common/schemas/abstract.schema';

/**
 * Schema: Libro del catálogo
 */
@Schema({ collection: 'books', timestamps: true })
export class BookSchema extends AbstractSchema {
  @Prop({ type: String, required: true, trim: true })
  title!: string;

  @Prop({ type: String, required: true, trim: true })
  author!: string;

  @Prop({ type: String, default: '' })
  description!: string;

  @Prop({ type: Number, required: true, min: 0 })
  price!: number;

  @Prop({ type: String, default: null })
  coverImage!: string | null;

  @Prop({ type: String, default: null })
  genre!: string | null;

  @Prop({ type: Number, default: 0, min: 0, max: 5 })
  rating!: number;

  @Prop({ type: Number, default: 0 })
  ratingCount!: number;

  @Prop({ type: Date, default: null })
  publishedDate!: Date | null;

  @Prop({ type: String, default: null })
  filePath!: string | null; // ruta del archivo en el storage

  @Prop({ type: Number, default: null })
  fileSize!: number | null;

  @Prop({ type: Boolean, default: true, index: true })
  isAvailable!: boolean;
}

export const BookSchemaFactory = SchemaFactory.createForClass(BookSchema);

BookSchemaFactory.index({ title: 1 });
BookSchemaFactory.index({ author: 1 });
BookSchemaFactory.index({ genre: 1, isAvailable: 1 });
BookSchemaFactory.index({ title: 'text', author: 'text', description: 'text' });
