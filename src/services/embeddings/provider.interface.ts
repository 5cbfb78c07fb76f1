/**
 * Turns event text into a vector for similarity search. `dimensions` must
 * equal the width of the `events.embedding` column.
 */
export interface EmbeddingProvider {
  readonly name: string;
  readonly dimensions: number;
  embed(text: string): Promise<number[]>;
}
