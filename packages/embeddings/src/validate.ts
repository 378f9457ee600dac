import { StageRejectedError } from "@docenrich/errors";

/** Every text must get exactly one vector of the configured dimension. */
export function assertVectors(
  provider: string,
  vectors: number[][],
  expectedCount: number,
  dimensions: number,
): void {
  if (vectors.length !== expectedCount) {
    throw new StageRejectedError(
      "embedding",
      `${provider} returned ${String(vectors.length)} vectors for ${String(expectedCount)} texts`,
    );
  }

  const wrong = vectors.findIndex((v) => v.length !== dimensions);
  if (wrong !== -1) {
    throw new StageRejectedError(
      "embedding",
      `${provider} returned a vector of dimension ${String(vectors[wrong]?.length ?? 0)}, expected ${String(dimensions)}`,
    );
  }
}
