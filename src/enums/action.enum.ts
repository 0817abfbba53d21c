export const ACTION_NAMES = [
  'ORIGINATED',
  'APPROVED',
  'DENIED',
  'WITHDRAWN',
  'INCOMPLETE',
  'PURCHASED',
  'PREDENIED',
  'PREAPPROVED',
] as const

export type ActionName = (typeof ACTION_NAMES)[number]

/**
 * Action taken on a loan application, as reported by the lender.
 * `code` is the value of the `actions_taken` query parameter.
 */
export class Action {
  static readonly ORIGINATED = new Action('ORIGINATED', 1)
  static readonly APPROVED = new Action('APPROVED', 2)
  static readonly DENIED = new Action('DENIED', 3)
  static readonly WITHDRAWN = new Action('WITHDRAWN', 4)
  static readonly INCOMPLETE = new Action('INCOMPLETE', 5)
  static readonly PURCHASED = new Action('PURCHASED', 6)
  static readonly PREDENIED = new Action('PREDENIED', 7)
  static readonly PREAPPROVED = new Action('PREAPPROVED', 8)

  private static readonly members: readonly Action[] = Object.freeze([
    Action.ORIGINATED,
    Action.APPROVED,
    Action.DENIED,
    Action.WITHDRAWN,
    Action.INCOMPLETE,
    Action.PURCHASED,
    Action.PREDENIED,
    Action.PREAPPROVED,
  ])

  private constructor(
    public readonly name: ActionName,
    public readonly code: number,
  ) {
    Object.freeze(this)
  }

  static values(): readonly Action[] {
    return Action.members
  }

  static fromName(name: ActionName): Action {
    const match = Action.members.find((member) => member.name === name)
    if (!match) {
      throw new Error(`Unknown action name: ${name}`)
    }
    return match
  }

  static isAction(value: unknown): value is Action {
    return value instanceof Action && Action.members.includes(value)
  }

  toString() {
    return `Action.${this.name}`
  }
}
