import { Entity, PrimaryGeneratedColumn, Column, Index } from 'typeorm';
import { countTransformer } from './transformers';

@Entity({ name: 'daily_impressions' })
export class DailyImpression {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index()
  @Column({ type: 'varchar', length: 50 })
  platform!: string;

  @Index()
  @Column({ type: Date })
  date!: Date;

  @Column({ name: 'total_impressions', type: 'bigint', default: 0, transformer: countTransformer })
  totalImpressions!: number;

  @Column({ name: 'total_engagements', type: 'integer', default: 0 })
  totalEngagements!: number;

  @Column({ name: 'recorded_at', type: Date })
  recordedAt!: Date;
}
