import { Entity, PrimaryGeneratedColumn, Column, Index } from 'typeorm';
import { countTransformer } from './transformers';

@Entity({ name: 'twitter_posts' })
export class TwitterPost {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index({ unique: true })
  @Column({ name: 'tweet_id', type: 'varchar', length: 255 })
  tweetId!: string;

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
  retweets!: number;

  @Column({ type: 'integer', default: 0 })
  replies!: number;

  @Column({ type: 'integer', default: 0 })
  quotes!: number;

  @Column({ name: 'scraped_at', type: Date })
  scrapedAt!: Date;
}
