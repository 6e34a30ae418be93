import { Column, Entity, Index, PrimaryColumn } from 'typeorm';

@Entity('social_posts')
@Index(['category', 'timestamp'])
export class SocialPostEntity {
  @PrimaryColumn({ name: 'post_id' })
  id!: string;

  @Column()
  category!: string;

  @Column('text')
  text!: string;

  @Column('timestamptz')
  timestamp!: Date;

  @Column('double precision', { nullable: true })
  lat!: number | null;

  @Column('double precision', { nullable: true })
  lon!: number | null;

  @Column('varchar', { name: 'signal_type' })
  signalType!: string;

  @Column('integer', { name: 'engagement_score', default: 0 })
  engagementScore!: number;

  @Column('varchar', { name: 'grid_id', nullable: true })
  gridId!: string | null;
}
