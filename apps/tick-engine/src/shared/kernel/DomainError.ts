export class DomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

export class InvalidDurationError extends DomainError {}
export class ReentrantUpdateError extends DomainError {}
