import { Entity, PrimaryGeneratedColumn, Column, Index } from 'typeorm';
import type { PipelineStatus } from '../types';

@Entity({ name: 'content_pipeline' })
export class ContentPipelineItem {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'text' })
  topic!: string;

  @Column({ name: 'original_url', type: 'text', nullable: true })
  originalUrl!: string | null;

  @Index()
  @Column({ type: 'varchar', length: 50, default: 'Inspiration' })
  status!: PipelineStatus;

  @Column({ type: 'text', nullable: true })
  draft!: string | null;

  @Column({ name: 'created_at', type: Date })
  createdAt!: Date;

  @Column({ name: 'updated_at', type: Date })
  updatedAt!: Date;
}
