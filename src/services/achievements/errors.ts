import { AppError } from "../../errors";

export class AlreadyRegisteredError extends AppError {
  constructor(name: string) {
    super(`The achievement ${name} is already registered`, 409, "ALREADY_REGISTERED", { name });
  }
}

export class NotRegisteredError extends AppError {
  constructor(name: string) {
    super(`The achievement ${name} is not registered with this tracker`, 404, "NOT_REGISTERED", {
      name,
    });
  }
}
