export type StringId = string;

export interface StringProperties {
  length: number;
  is_palindrome: boolean;
  unique_characters: number;
  word_count: number;
  sha256_hash: string;
  // first-occurrence order; written in that order by toOrderedJson
  character_frequency_map: ReadonlyMap<string, number>;
}

export interface StringRecord {
  id: StringId;         // always equals properties.sha256_hash
  value: string;        // untrimmed, as submitted
  properties: StringProperties;
  created_at: Date;
}
