/**
 * Artifact selection and naming for one generated target
 */

import {
  type Diagnostic,
  type DispatchModel,
  type Result,
  ok,
} from "@dispatchgen/frontend";
import type { EmitterOptions } from "./c/options.js";
import { emitHeader } from "./c/header.js";
import { emitDispatchSource } from "./c/dispatch-source.js";
import { emitVapi } from "./c/vapi.js";

export type ArtifactKind = "header" | "source" | "vapi";

export type ArtifactSelection = {
  readonly header: boolean;
  readonly source: boolean;
  readonly vapi: boolean;
};

export const defaultArtifacts: ArtifactSelection = {
  header: true,
  source: true,
  vapi: false,
};

export type GeneratedArtifact = {
  readonly kind: ArtifactKind;
  readonly fileName: string;
  readonly content: string;
};

export const artifactFileName = (
  target: string,
  kind: ArtifactKind
): string => {
  switch (kind) {
    case "header":
      return `${target}_generated.h`;
    case "source":
      return `${target}_generated_dispatch.c`;
    case "vapi":
      return `${target}_generated.vapi`;
  }
};

/**
 * Render the selected artifacts. Either every selected artifact renders or
 * none is returned.
 */
export const emitArtifacts = (
  model: DispatchModel,
  selection: ArtifactSelection = defaultArtifacts,
  options: Partial<EmitterOptions> = {}
): Result<readonly GeneratedArtifact[], readonly Diagnostic[]> => {
  const artifacts: GeneratedArtifact[] = [];
  const artifact = (kind: ArtifactKind, content: string): void => {
    artifacts.push({
      kind,
      fileName: artifactFileName(model.target, kind),
      content,
    });
  };

  if (selection.header) {
    artifact("header", emitHeader(model, options));
  }
  if (selection.source) {
    const source = emitDispatchSource(model, options);
    if (!source.ok) return source;
    artifact("source", source.value);
  }
  if (selection.vapi) {
    artifact("vapi", emitVapi(model, options));
  }

  return ok(artifacts);
};
