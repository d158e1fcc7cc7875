import { Data, Either } from "effect";

export type RepositoryRef = {
  readonly owner: string;
  readonly name: string;
};

export class InvalidRepositoryReference extends Data.TaggedError(
  "InvalidRepositoryReference",
)<{
  input: string;
  message: string;
}> {}

const stripSuffixes = (input: string): string =>
  input.trim().replace(/\/+$/, "").replace(/\.git$/, "").replace(/\/+$/, "");

// Absolute http(s) URLs lose their scheme and host; anything else is
// treated as a bare path such as "owner/repo" or "github.com/owner/repo".
const pathOf = (input: string): string => {
  if (!/^https?:\/\//i.test(input)) return input;
  try {
    return new URL(input).pathname;
  } catch {
    return input.replace(/^https?:\/\/[^/]*/i, "");
  }
};

const decodeSegment = (segment: string): string | undefined => {
  try {
    return decodeURIComponent(segment);
  } catch {
    return undefined;
  }
};

/**
 * Derive `(owner, name)` from a repository URL: trailing slashes and a
 * trailing `.git` are dropped, then the last two path segments are taken and
 * percent-decoded.
 *
 * `https://github.com/tiangolo/fastapi.git` → `{ owner: "tiangolo", name: "fastapi" }`
 */
export const parseRepositoryRef = (
  input: string,
): Either.Either<RepositoryRef, InvalidRepositoryReference> => {
  const segments = pathOf(stripSuffixes(input))
    .split("/")
    .filter((s) => s.length > 0);

  const rawName = segments.at(-1);
  const rawOwner = segments.at(-2);
  if (rawOwner === undefined || rawName === undefined) {
    return Either.left(
      new InvalidRepositoryReference({
        input,
        message: `Not a repository URL: "${input}" (expected .../<owner>/<repo>)`,
      }),
    );
  }

  const owner = decodeSegment(rawOwner);
  const name = decodeSegment(rawName);
  if (owner === undefined || name === undefined) {
    return Either.left(
      new InvalidRepositoryReference({
        input,
        message: `Not a repository URL: "${input}" (malformed percent-encoding)`,
      }),
    );
  }
  return Either.right({ owner, name });
};

export const formatRepositoryRef = (ref: RepositoryRef): string =>
  `${ref.owner}/${ref.name}`;
