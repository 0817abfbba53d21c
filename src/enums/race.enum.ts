export const RACE_NAMES = [
  'ASIAN',
  'PACIFIC_ISLANDER',
  'FREE_FORM',
  'UNAVAILABLE',
  'NATIVE_AMERICAN',
  'BLACK',
  'MIXED_MINORITY',
  'WHITE',
  'JOINT',
] as const

export type RaceName = (typeof RACE_NAMES)[number]

/**
 * Derived race category of the applicant(s). The API filters races by label,
 * which is looked up from `RACE_LABELS` by `code`.
 */
export class Race {
  static readonly ASIAN = new Race('ASIAN', 0)
  static readonly PACIFIC_ISLANDER = new Race('PACIFIC_ISLANDER', 1)
  static readonly FREE_FORM = new Race('FREE_FORM', 2)
  static readonly UNAVAILABLE = new Race('UNAVAILABLE', 3)
  static readonly NATIVE_AMERICAN = new Race('NATIVE_AMERICAN', 4)
  static readonly BLACK = new Race('BLACK', 5)
  static readonly MIXED_MINORITY = new Race('MIXED_MINORITY', 6)
  static readonly WHITE = new Race('WHITE', 7)
  static readonly JOINT = new Race('JOINT', 8)

  private static readonly members: readonly Race[] = Object.freeze([
    Race.ASIAN,
    Race.PACIFIC_ISLANDER,
    Race.FREE_FORM,
    Race.UNAVAILABLE,
    Race.NATIVE_AMERICAN,
    Race.BLACK,
    Race.MIXED_MINORITY,
    Race.WHITE,
    Race.JOINT,
  ])

  private constructor(
    public readonly name: RaceName,
    public readonly code: number,
  ) {
    Object.freeze(this)
  }

  static values(): readonly Race[] {
    return Race.members
  }

  static fromName(name: RaceName): Race {
    const match = Race.members.find((member) => member.name === name)
    if (!match) {
      throw new Error(`Unknown race name: ${name}`)
    }
    return match
  }

  static isRace(value: unknown): value is Race {
    return value instanceof Race && Race.members.includes(value)
  }

  toString() {
    return `Race.${this.name}`
  }
}
