import { plainToInstance } from "class-transformer";
import { validateSync, ValidationError } from "class-validator";
import { MalformedEnvelopeError } from "../errors";
import { SubmissionEnvelopeDto } from "./dto/submission-envelope.dto";

function collectProblems(errors: ValidationError[]): string[] {
  return errors.flatMap((error) => Object.values(error.constraints ?? {}));
}

/**
 * Decode and validate one raw queue payload.
 *
 * @throws MalformedEnvelopeError when the payload is not JSON, not an object,
 *   or misses or mistypes an envelope field
 */
export function parseEnvelope(payload: string): SubmissionEnvelopeDto {
  let decoded: unknown;
  try {
    decoded = JSON.parse(payload);
  } catch (error) {
    throw new MalformedEnvelopeError(
      `Payload is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  if (typeof decoded !== "object" || decoded === null || Array.isArray(decoded)) {
    throw new MalformedEnvelopeError("Payload is not a JSON object");
  }

  const envelope = plainToInstance(SubmissionEnvelopeDto, decoded);
  const errors = validateSync(envelope);
  if (errors.length > 0) {
    const problems = collectProblems(errors);
    throw new MalformedEnvelopeError(
      `Invalid submission envelope: ${problems.join("; ")}`,
      problems,
    );
  }

  return envelope;
}
