export * from './book-query.dto';
export * from './book.dto';
