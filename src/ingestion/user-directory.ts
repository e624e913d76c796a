import { Injectable } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { User } from '../database/entities';

export const USER_DIRECTORY = Symbol('USER_DIRECTORY');

export interface ContributorUser {
  id: number;
  email: string;
}

export interface UserDirectory {
  /** Case-insensitive exact match on the stored email. */
  findByEmail(email: string): Promise<ContributorUser | null>;
}

@Injectable()
export class TypeOrmUserDirectory implements UserDirectory {
  constructor(private readonly dataSource: DataSource) {}

  private get repo() {
    return this.dataSource.getRepository(User);
  }

  async findByEmail(email: string): Promise<ContributorUser | null> {
    // Served by users_email_lower_idx.
    const user = await this.repo
      .createQueryBuilder('u')
      .where('LOWER(u.email) = LOWER(:email)', { email })
      .getOne();
    return user ? { id: user.id, email: user.email } : null;
  }
}
