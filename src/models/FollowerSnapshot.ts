import { Entity, PrimaryGeneratedColumn, Column, Index } from 'typeorm';

/**
 * Point-in-time follower count for one platform. Rows are only ever inserted.
 */
@Entity({ name: 'follower_snapshots' })
export class FollowerSnapshot {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index()
  @Column({ type: 'varchar', length: 50 })
  platform!: string;

  @Column({ name: 'follower_count', type: 'integer' })
  followerCount!: number;

  @Column({ name: 'following_count', type: 'integer', default: 0 })
  followingCount!: number;

  @Index()
  @Column({ name: 'recorded_at', type: Date })
  recordedAt!: Date;
}
