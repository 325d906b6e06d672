import { Column, Entity, PrimaryColumn, UpdateDateColumn } from 'typeorm';

export type StoredFieldValue = string | number | boolean | null;

@Entity('documents')
export class StoredDocument {
  // Full document path, e.g. users/u1/recordings/r1
  @PrimaryColumn({ type: 'varchar' })
  path!: string;

  @Column({ type: 'jsonb' })
  fields!: Record<string, StoredFieldValue>;

  @UpdateDateColumn({ type: 'timestamp' })
  updatedAt!: Date;
}
