import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn } from 'typeorm';

/**
 * Directory user. Managed by the account service; this service only reads it
 * to attribute commits by author email.
 */
@Entity('users')
export class User {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 255, unique: true })
  email!: string;

  @Column({ type: 'varchar', length: 255, nullable: true })
  full_name!: string | null;

  @CreateDateColumn({ type: 'timestamptz' })
  created_at!: Date;
}
