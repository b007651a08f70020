import { Entity, PrimaryGeneratedColumn, Column, Index } from 'typeorm';
import type { CalendarStatus } from '../types';

@Entity({ name: 'twitter_calendar' })
export class CalendarItem {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'text' })
  topic!: string;

  @Column({ type: 'text', nullable: true })
  draft!: string | null;

  // 'YYYY-MM-DD'; date columns hydrate as strings
  @Index()
  @Column({ name: 'scheduled_date', type: 'date', nullable: true })
  scheduledDate!: string | null;

  @Index()
  @Column({ type: 'varchar', length: 50, default: 'Pending' })
  status!: CalendarStatus;

  @Column({ name: 'created_at', type: Date })
  createdAt!: Date;

  @Column({ name: 'updated_at', type: Date })
  updatedAt!: Date;
}
