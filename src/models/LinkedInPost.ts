import { Entity, PrimaryGeneratedColumn, Column, Index } from 'typeorm';
import { countTransformer } from './transformers';

@Entity({ name: 'linkedin_posts' })
export class LinkedInPost {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index({ unique: true })
  @Column({ name: 'post_id', type: 'varchar', length: 255 })
  postId!: string;

  @Column({ type: 'text', nullable: true })
  url!: string | null;

  @Column({ type: 'text', nullable: true })
  content!: string | null;

  @Column({ name: 'date_posted', type: Date, nullable: true })
  datePosted!: Date | null;

  @Column({ type: 'bigint', default: 0, transformer: countTransformer })
  views!: number;

  @Column({ type: 'integer', default: 0 })
  likes!: number;

  @Column({ type: 'integer', default: 0 })
  comments!: number;

  @Column({ type: 'integer', default: 0 })
  reposts!: number;

  @Column({ name: 'scraped_at', type: Date })
  scrapedAt!: Date;
}
