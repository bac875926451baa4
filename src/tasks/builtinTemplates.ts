import { ConfigError } from "../core/errors.js";
import { validateTemplate, type TaskTemplate } from "./templates.js";

const bidsParticipant: TaskTemplate = {
  name: "bids-app",
  description: "BIDS app, participant level: one unit per subject folder, dataset sidecars shared by all units.",
  image: "poldracklab/fmriprep:latest",
  entrypoint: null,
  stagingModes: ["shared", "transfer"],
  strategy: "per_entry",
  controlSuffixes: [".json", ".tsv"],
  markerSuffix: null,
  labelStripPrefixes: ["sub-", "sub_"],
  inputs: { containerDir: "/bids" },
  output: { containerPath: "/output" },
  license: { containerPath: "/opt/freesurfer/license.txt", argv: ["--fs-license-file", "{license}"] },
  extraBindings: [],
  argv: ["{input}", "{output}", "participant", "--participant_label", "{label}"],
  defaultArgs: {},
  env: {}
};

const bidsGroup: TaskTemplate = {
  ...bidsParticipant,
  name: "bids-group",
  description: "BIDS app, group level: the whole dataset as a single unit.",
  strategy: "collective",
  controlSuffixes: [],
  labelStripPrefixes: [],
  argv: ["{primary}", "{output}", "{arg:analysis_level}"],
  defaultArgs: { analysis_level: "group" }
};

const eager: TaskTemplate = {
  name: "eager",
  description: "EAGER pipeline: one unit per subject folder holding an .xml run configuration.",
  image: "shub://apeltzer/EAGER-GUI",
  entrypoint: null,
  stagingModes: ["shared", "transfer"],
  strategy: "per_entry",
  controlSuffixes: [],
  markerSuffix: ".xml",
  labelStripPrefixes: [],
  inputs: { containerDir: "/data" },
  output: { containerPath: "/output" },
  license: null,
  extraBindings: [],
  argv: ["eagercli", "{marker}"],
  defaultArgs: {},
  env: {}
};

const stacks: TaskTemplate = {
  name: "stacks",
  description: "Stacks on paired-end reads: one unit per R1/R2 fastq.gz pair.",
  image: "smaffiol/stacks:2.0Beta9a",
  entrypoint: null,
  stagingModes: ["transfer", "shared"],
  strategy: "paired_reads",
  controlSuffixes: [],
  markerSuffix: null,
  labelStripPrefixes: [],
  inputs: { containerDir: "/input" },
  output: { containerPath: "/output" },
  license: null,
  extraBindings: [{ key: "run_script", containerPath: "/opt/fanout/run-stacks.sh", mode: "ro" }],
  argv: ["/bin/bash", "{bind:run_script}", "{input}", "{output}"],
  defaultArgs: {},
  env: {}
};

const gwas: TaskTemplate = {
  name: "gwas",
  description: "GWAS: one unit per input folder against a shared chromosomes folder.",
  image: "smaffiol/gwas:1.0.0",
  entrypoint: null,
  stagingModes: ["shared", "transfer"],
  strategy: "per_entry",
  controlSuffixes: [],
  markerSuffix: null,
  labelStripPrefixes: [],
  inputs: { containerDir: "/data" },
  output: { containerPath: "/output" },
  license: null,
  extraBindings: [{ key: "chromosomes", containerPath: "/chromosomes", mode: "ro" }],
  argv: ["{primary}", "{bind:chromosomes}", "{output}"],
  defaultArgs: {},
  env: {}
};

const chunkedApp: TaskTemplate = {
  name: "chunked-app",
  description: "Generic containerized analysis over byte-size-bounded groups of input files.",
  image: "poldracklab/fmriprep:latest",
  entrypoint: null,
  stagingModes: ["transfer", "shared"],
  strategy: "chunked",
  controlSuffixes: [],
  markerSuffix: null,
  labelStripPrefixes: [],
  inputs: { containerDir: "/input" },
  output: { containerPath: "/output" },
  license: null,
  extraBindings: [],
  argv: ["{input}", "{output}", "{arg:analysis_level}"],
  defaultArgs: { analysis_level: "participant" },
  env: {}
};

export const BUILTIN_TEMPLATES: readonly TaskTemplate[] = [bidsParticipant, bidsGroup, eager, stacks, gwas, chunkedApp].map(
  validateTemplate
);

export function findTemplate(name: string, custom: readonly TaskTemplate[] = []): TaskTemplate {
  const found = custom.find((t) => t.name === name) ?? BUILTIN_TEMPLATES.find((t) => t.name === name);
  if (!found) {
    const known = [...custom, ...BUILTIN_TEMPLATES].map((t) => t.name).join(", ");
    throw new ConfigError(`unknown template: ${name} (known: ${known})`);
  }
  return found;
}
