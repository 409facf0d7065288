/**
 * IEDB ligand dataset pipeline.
 *
 * Downloads the MHC allele sequences, the IEDB ligand export and the
 * mhcflurry reference releases, then curates, annotates and enumerates
 * proteome peptides with the downloads-generation tools. Outputs land in
 * generated/ as bzip2-compressed CSV files.
 */

import { join } from "node:path";
import type { InputSpec, OutputSpec, Pipeline, Stage } from "../types/index.js";
import { finalPath } from "../types/index.js";
import { definePipeline } from "../pipeline/index.js";
import { createLayout, type WorkspaceLayout } from "./layout.js";

export const MHCFLURRY_RELEASES = "https://github.com/openvax/mhcflurry/releases/download";
export const IEDB_LIGAND_EXPORT_URL =
  "https://www.iedb.org/downloader.php?file_name=doc/mhc_ligand_full_single_file.zip";

export const IEDB_PIPELINE_NAME = "iedb";

export const PEPTIDE_LENGTHS = [8, 9, 10, 11, 12, 13, 14, 15] as const;

export interface IedbPipelineOptions {
  /** Working directory root */
  workDir: string;
  /** downloads-generation checkout */
  toolsDir: string;
  /** Directory holding add_post_mhcflurry_col.py */
  scriptsDir: string;
  python: string;
}

interface Release {
  readonly dataset: string;
  readonly archive: string;
  readonly url: string;
  readonly members: readonly string[];
}

/**
 * mhcflurry release archives the pipeline reads.
 */
export const RELEASES = {
  alleleSequences: {
    dataset: "allele_sequences",
    archive: "allele_sequences.20191231.tar.bz2",
    url: `${MHCFLURRY_RELEASES}/1.4.0/allele_sequences.20191231.tar.bz2`,
    members: [
      "class1_pseudosequences.csv",
      "allele_sequences.no_differentiation.csv",
      "allele_sequences.csv",
    ],
  },
  iedb: {
    dataset: "data_iedb",
    archive: "data_iedb.20200427.tar.bz2",
    url: `${MHCFLURRY_RELEASES}/pre-1.7.0/data_iedb.20200427.tar.bz2`,
    members: ["mhc_ligand_full.csv.bz2"],
  },
  curated: {
    dataset: "data_curated",
    archive: "data_curated.20200427.tar.bz2",
    url: `${MHCFLURRY_RELEASES}/pre-1.7.0/data_curated.20200427.tar.bz2`,
    members: ["rna_expression.csv.bz2"],
  },
  references: {
    dataset: "data_references",
    archive: "data_references.20190927.tar.bz2",
    url: `${MHCFLURRY_RELEASES}/pre-1.4.0/data_references.20190927.tar.bz2`,
    members: ["uniprot_proteins.csv.bz2", "uniprot_proteins.fm"],
  },
} as const satisfies Record<string, Release>;

function input(output: OutputSpec, name: string = output.name): InputSpec {
  return { name, path: finalPath(output) };
}

/**
 * Fetch + expand stage pair for a release archive.
 */
function releaseStages(
  layout: WorkspaceLayout,
  key: string,
  release: Release
): { stages: Stage[]; members: Map<string, OutputSpec> } {
  const archive: OutputSpec = {
    name: "archive",
    path: layout.dataset(release.dataset, release.archive),
  };
  const members = new Map(
    release.members.map((member): [string, OutputSpec] => [
      member,
      { name: member, path: layout.dataset(release.dataset, member) },
    ])
  );

  return {
    stages: [
      {
        kind: "fetch",
        name: `fetch-${key}`,
        resource: { url: release.url },
        inputs: [],
        outputs: [archive],
      },
      {
        kind: "expand",
        name: `expand-${key}`,
        archive: "archive",
        destination: layout.dataset(release.dataset),
        inputs: [input(archive)],
        outputs: [...members.values()],
      },
    ],
    members,
  };
}

function member(members: Map<string, OutputSpec>, name: string): OutputSpec {
  const spec = members.get(name);
  if (spec === undefined) {
    throw new Error(`Release has no member ${name}`);
  }
  return spec;
}

/**
 * Build the pipeline. Paths depend only on the options.
 */
export function createIedbPipeline(options: IedbPipelineOptions): Readonly<Pipeline> {
  const layout = createLayout(options.workDir);
  const tool = (dir: string, script: string): string => join(options.toolsDir, dir, script);

  const alleles = releaseStages(layout, "allele-sequences", RELEASES.alleleSequences);

  const ligandZip: OutputSpec = {
    name: "archive",
    path: layout.download("mhc_ligand_full.zip"),
  };
  const ligandCsv: OutputSpec = {
    name: "mhc_ligand_full.csv",
    path: layout.download("mhc_ligand_full.csv"),
  };

  const iedbSnapshot = releaseStages(layout, "mhcflurry-iedb", RELEASES.iedb);
  const curatedRelease = releaseStages(layout, "curated", RELEASES.curated);
  const references = releaseStages(layout, "references", RELEASES.references);

  const curatedAll: OutputSpec = {
    name: "all",
    path: layout.generated("iedb_curated_all.csv"),
    compress: "bzip2",
  };
  const curatedAffinity: OutputSpec = {
    name: "affinity",
    path: layout.generated("iedb_curated_affinity.csv"),
    compress: "bzip2",
  };
  const curatedMs: OutputSpec = {
    name: "ms",
    path: layout.generated("iedb_curated_ms.csv"),
    compress: "bzip2",
  };
  const annotatedMs: OutputSpec = {
    name: "annotated",
    path: layout.generated("iedb_annotated_ms.csv"),
    compress: "bzip2",
  };
  const proteomePeptides: OutputSpec = {
    name: "peptides",
    path: layout.generated("iedb_proteome_peptides.csv"),
    compress: "bzip2",
  };

  const mhcflurryLigands = member(iedbSnapshot.members, "mhc_ligand_full.csv.bz2");
  const uniprotCsv = member(references.members, "uniprot_proteins.csv.bz2");
  const uniprotIndex = member(references.members, "uniprot_proteins.fm");

  const curateDir = join(options.toolsDir, "data_curated");
  const postMhcflurryColumn = (output: string) => ({
    program: options.python,
    args: [
      join(options.scriptsDir, "add_post_mhcflurry_col.py"),
      `{output:${output}}`,
      "{input:mhcflurry_ligands}",
    ],
    cwd: curateDir,
  });

  const stages: Stage[] = [
    ...alleles.stages,
    {
      kind: "fetch",
      name: "fetch-iedb-ligands",
      resource: { url: IEDB_LIGAND_EXPORT_URL },
      inputs: [],
      outputs: [ligandZip],
    },
    {
      kind: "expand",
      name: "expand-iedb-ligands",
      archive: "archive",
      destination: layout.root,
      inputs: [input(ligandZip)],
      outputs: [ligandCsv],
    },
    ...iedbSnapshot.stages,
    {
      kind: "command",
      name: "curate-iedb",
      description: "Curate the IEDB export and flag references newer than mhcflurry 2.0",
      inputs: [
        input(ligandCsv, "iedb"),
        input(member(alleles.members, "class1_pseudosequences.csv"), "pseudosequences"),
        input(member(alleles.members, "allele_sequences.no_differentiation.csv"), "sequences_nodiff"),
        input(member(alleles.members, "allele_sequences.csv"), "sequences"),
        input(mhcflurryLigands, "mhcflurry_ligands"),
      ],
      outputs: [curatedAll, curatedAffinity, curatedMs],
      commands: [
        {
          program: options.python,
          args: [
            tool("data_curated", "curate.py"),
            "--data-iedb",
            "{input:iedb}",
            "--class1-pseudosequences-csv",
            "{input:pseudosequences}",
            "--allele-sequences-nodiff-csv",
            "{input:sequences_nodiff}",
            "--allele-sequences-csv",
            "{input:sequences}",
            "--out-csv",
            "{output:all}",
            "--out-affinity-csv",
            "{output:affinity}",
            "--out-mass-spec-csv",
            "{output:ms}",
          ],
          cwd: curateDir,
        },
        postMhcflurryColumn("all"),
        postMhcflurryColumn("affinity"),
        postMhcflurryColumn("ms"),
      ],
    },
    ...curatedRelease.stages,
    ...references.stages,
    {
      kind: "command",
      name: "annotate-mass-spec",
      description: "Map mass-spec hits onto the reference proteome",
      inputs: [
        input(curatedMs, "hits"),
        input(uniprotCsv, "proteins"),
        input(uniprotIndex, "proteins_index"),
      ],
      outputs: [annotatedMs],
      commands: [
        {
          program: options.python,
          args: [
            tool("data_mass_spec_annotated", "annotate.py"),
            "{input:hits}",
            "{input:proteins}",
            "{input:proteins_index}",
            "--out",
            "{output:annotated}",
          ],
          cwd: join(options.toolsDir, "data_mass_spec_annotated"),
        },
      ],
    },
    {
      kind: "command",
      name: "write-proteome-peptides",
      description: "Enumerate proteome peptides around the annotated hits",
      inputs: [input(annotatedMs, "hits"), input(uniprotCsv, "proteins")],
      outputs: [proteomePeptides],
      commands: [
        {
          program: options.python,
          args: [
            tool("data_predictions", "write_proteome_peptides.py"),
            "{input:hits}",
            "{input:proteins}",
            "--lengths",
            ...PEPTIDE_LENGTHS.map(String),
            "--out",
            "{output:peptides}",
          ],
          cwd: join(options.toolsDir, "data_predictions"),
        },
      ],
    },
  ];

  return definePipeline({ name: IEDB_PIPELINE_NAME, root: options.workDir, stages });
}
