import { Result } from '@core/domain/result'
import type { EmailAlreadyRegisteredError } from '@core/errors/auth.error'
import type { DatabaseError } from '@core/errors/database.error'
import { User } from '@modules/auth/domain/entities/user'

export interface UserRepository {
  findByEmail(email: string): Promise<Result<User | null, DatabaseError>>

  /**
   * Stores the user unless another account already uses its email. The
   * lookup and the insert are one operation from the caller's point of view;
   * without a unique index two concurrent calls can still both succeed.
   */
  createIfEmailAvailable(
    user: User,
  ): Promise<Result<User, EmailAlreadyRegisteredError | DatabaseError>>
}
