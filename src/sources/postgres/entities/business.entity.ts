import { Column, Entity, Index, PrimaryColumn } from 'typeorm';

@Entity('businesses')
@Index(['lat', 'lon'])
export class BusinessEntity {
  @PrimaryColumn({ name: 'business_id' })
  id!: string;

  @Column()
  name!: string;

  @Index()
  @Column()
  category!: string;

  @Column('double precision')
  lat!: number;

  @Column('double precision')
  lon!: number;

  @Column('double precision', { nullable: true })
  rating!: number | null;

  @Column('integer', { name: 'review_count', default: 0 })
  reviewCount!: number;

  @Column('varchar', { name: 'grid_id', nullable: true })
  gridId!: string | null;

  @Column('text', { array: true, nullable: true })
  types!: string[] | null;

  @Column('smallint', { name: 'price_level', nullable: true })
  priceLevel!: number | null;
}
