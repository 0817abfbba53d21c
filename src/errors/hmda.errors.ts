export class InvalidStateError extends Error {
  readonly token: string
  readonly index?: number

  constructor(token: string, index?: number) {
    super(
      index === undefined
        ? `The input '${token}' is not a valid state input. Please ensure your input is a valid two-letter state abbreviation. To pass multiple states, pass each abbreviation as a separate list element.`
        : `The input '${token}' at index ${index} is not a valid state input. Please ensure all inputs are valid two-letter state abbreviations.`,
    )
    this.name = 'InvalidStateError'
    this.token = token
    this.index = index
  }
}

export class InvalidEnumValueError extends TypeError {
  readonly enumName: string
  readonly value: unknown
  readonly index?: number

  constructor(enumName: string, value: unknown, index?: number) {
    const position = index === undefined ? '' : ` at index ${index}`
    super(
      `The input '${String(value)}'${position} is not a valid input. Please use an option from the '${enumName}' class.`,
    )
    this.name = 'InvalidEnumValueError'
    this.enumName = enumName
    this.value = value
    this.index = index
  }
}

export class InsufficientFilterError extends Error {
  constructor(resource: string) {
    super(
      `The ${resource} resource requires an argument to at least one of 'actions' or 'races'.`,
    )
    this.name = 'InsufficientFilterError'
  }
}

export class ApiRequestFailedError extends Error {
  readonly status: number
  readonly body: string

  constructor(status: number, body: string) {
    super(body)
    this.name = 'ApiRequestFailedError'
    this.status = status
    this.body = body
  }
}
