import { z } from 'zod';

/**
 * Urban design parameters. The pipeline core treats them as opaque; generators
 * read the sub-fields they need (street widths, setbacks, ...).
 */

const metres = z.number().min(0);
const percent = z.number().min(0).max(100);

const publicRoadsSchema = z
  .object({
    width_of_arteries_m: metres,
    width_of_secondaries_m: metres,
    width_of_locals_m: metres,
  })
  .strict();

const onGridPartitionsSchema = z
  .object({
    depth_along_arteries_m: metres,
    depth_along_secondaries_m: metres,
    depth_along_locals_m: metres,
  })
  .strict();

const offGridPartitionsSchema = z
  .object({
    cluster_depth_m: metres,
    cluster_size_lots: z.number().int().min(0),
    cluster_width_m: metres,
    lot_depth_along_path_m: metres,
    lot_depth_around_yard_m: metres,
  })
  .strict();

const blockStructureSchema = z
  .object({
    off_grid_clusters_in_depth_m: metres,
    off_grid_clusters_in_width_m: metres,
  })
  .strict();

const urbanBlockStructureSchema = z
  .object({
    along_arteries: blockStructureSchema,
    along_secondaries: blockStructureSchema,
    along_locals: blockStructureSchema,
  })
  .strict();

const publicSpacesSchema = z
  .object({
    open_spaces: z.object({ open_space_percentage: percent }).strict(),
    amenities: z.object({ amenities_percentage: percent }).strict(),
    street_section: z.object({ sidewalk_width_m: metres }).strict(),
    trees: z
      .object({
        show_trees_frontend: z.boolean(),
        tree_spacing_m: metres,
        initial_tree_height_m: metres,
        final_tree_height_m: metres,
      })
      .strict(),
  })
  .strict();

const neighbourhoodSchema = z
  .object({
    public_roads: publicRoadsSchema,
    on_grid_partitions: onGridPartitionsSchema,
    off_grid_partitions: offGridPartitionsSchema,
    urban_block_structure: urbanBlockStructureSchema,
    public_spaces: publicSpacesSchema,
  })
  .strict();

const lotConfigSchema = z
  .object({
    depth_m: metres,
    width_m: metres,
    front_setback_m: metres,
    side_margins_m: metres,
    rear_setback_m: metres,
    number_of_floors: z.number().int().min(0),
  })
  .strict();

const tissueSchema = z
  .object({
    on_grid_lots_on_arteries: lotConfigSchema,
    on_grid_lots_on_secondaries: lotConfigSchema,
    on_grid_lots_on_locals: lotConfigSchema,
    off_grid_cluster_type_1: z
      .object({
        access_path_width_on_grid_m: metres,
        internal_path_width_m: metres,
        open_space_width_m: metres,
        open_space_length_m: metres,
        lot_width_m: metres,
        front_setback_m: metres,
        side_margins_m: metres,
        rear_setback_m: metres,
        number_of_floors: z.number().int().min(0),
      })
      .strict(),
    off_grid_cluster_type_2: z
      .object({
        internal_path_width_m: metres,
        cul_de_sac_width_m: metres,
        lot_width_m: metres,
        lot_depth_behind_cul_de_sac_m: metres,
      })
      .strict(),
    corner_bonus: z
      .object({
        description: z.string(),
        with_artery_percent: percent,
        with_secondary_percent: percent,
        with_local_percent: percent,
      })
      .strict(),
    fire_protection: z
      .object({ fire_proof_partitions_with_6m_margins: z.boolean() })
      .strict(),
  })
  .strict();

const initialBuildingPercentSchema = z
  .object({
    initial_width_percent: percent,
    initial_depth_percent: percent,
    initial_floors_percent: percent,
  })
  .strict();

const starterBuildingsSchema = z
  .object({
    on_grid_lots_on_arteries: z
      .object({
        corner_with_other_artery: initialBuildingPercentSchema,
        corner_with_secondary: initialBuildingPercentSchema,
        corner_with_tertiary: initialBuildingPercentSchema,
        regular_lot: initialBuildingPercentSchema,
      })
      .strict(),
    on_grid_lots_on_secondaries: z
      .object({
        corner_with_other_secondary: initialBuildingPercentSchema,
        corner_with_tertiary: initialBuildingPercentSchema,
        regular_lot: initialBuildingPercentSchema,
      })
      .strict(),
    on_grid_lots_on_locals: z
      .object({
        corner_with_other_local: initialBuildingPercentSchema,
        regular_lot: initialBuildingPercentSchema,
      })
      .strict(),
    off_grid_cluster_type_1: initialBuildingPercentSchema,
    off_grid_cluster_type_2: initialBuildingPercentSchema,
  })
  .strict();

export const projectParametersSchema = z
  .object({
    neighbourhood: neighbourhoodSchema,
    tissue: tissueSchema,
    starter_buildings: starterBuildingsSchema,
  })
  .strict();

export type ProjectParameters = z.infer<typeof projectParametersSchema>;
