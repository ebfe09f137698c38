import {
  DefaultEntity,
  type EntityTimestamps,
} from '@core/domain/entity/default-entity'
import { UniqueEntityID } from '@core/domain/value-objects/unique-entity-id.vo'

export type UserProps = {
  name: string
  email: string
  passwordHash: string
  avatarUrl?: string
}

/**
 * Account created at signup and read at signin. Never updated.
 */
export class User extends DefaultEntity {
  readonly name: string
  readonly email: string
  readonly passwordHash: string
  readonly avatarUrl: string | undefined

  private constructor(
    props: UserProps,
    id: UniqueEntityID,
    timestamps?: EntityTimestamps,
  ) {
    super(id, timestamps)
    this.name = props.name
    this.email = props.email
    this.passwordHash = props.passwordHash
    this.avatarUrl = props.avatarUrl
  }

  static create(props: UserProps): User {
    return new User(props, UniqueEntityID.create())
  }

  static restore(
    props: UserProps,
    id: UniqueEntityID,
    timestamps: EntityTimestamps,
  ): User {
    return new User(props, id, timestamps)
  }
}
