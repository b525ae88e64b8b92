import type { Finding } from "../types";
import { createDescriptor, createFinding, defineRule } from "./common";

export const STRAY_MARKER_ID = "FL0007";
export const UNNECESSARY_INTERPOLATION_ID = "FL0014";

export const STRAY_MARKER = "$";

export const strayMarkerDescriptor = createDescriptor({
  id: STRAY_MARKER_ID,
  title: "Unintentional ${} in interpolated strings",
  messageFormat: "Avoid using ${} in interpolated strings.",
  category: "usage",
  severity: "warning",
  kinds: ["interpolated-string"],
});

export const unnecessaryInterpolationDescriptor = createDescriptor({
  id: UNNECESSARY_INTERPOLATION_ID,
  title: "Unnecessary interpolated string",
  messageFormat: "Avoid using an interpolated string where an equivalent literal string exists.",
  category: "usage",
  severity: "warning",
  kinds: ["interpolated-string"],
});

export function createInterpolatedStringRule() {
  return defineRule({
    name: "interpolated-string",
    descriptors: [strayMarkerDescriptor, unnecessaryInterpolationDescriptor],
    kinds: ["interpolated-string"],
    start() {
      return (value) => {
        const findings: Finding[] = [];

        if (value.span && !value.contents.some((content) => content.kind === "interpolation")) {
          findings.push(createFinding(unnecessaryInterpolationDescriptor, value.span));
        }

        let afterMarker = false;
        for (const content of value.contents) {
          if (content.kind === "interpolated-text" && content.text.endsWith(STRAY_MARKER)) {
            afterMarker = true;
            continue;
          }
          if (afterMarker && content.kind === "interpolation" && content.span) {
            findings.push(createFinding(strayMarkerDescriptor, content.span));
          }
          afterMarker = false;
        }

        return findings;
      };
    },
  });
}
