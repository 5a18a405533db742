export type YearHistogram = Map<string, number>;

export interface KindCounts {
  consignments: number;
  iiif_manifests: number;
  images: number;
  items: number;
  related_entities: number;
  units: number;
}

export interface SeriesStats extends KindCounts {
  title: string;
  agencies: Set<string>;
  years: YearHistogram;
}

export interface AgencyStats extends KindCounts {
  title: string;
  series: Set<string>;
  years: YearHistogram;
}

export interface OverallReport {
  categories: Record<string, number>;
  iiif_manifests: number;
  objects: number;
  units: number;
  years: Record<string, number>;
}

export interface SeriesReport {
  id: string;
  title: string;
  agencies: string[];
  consignments: number;
  iiif_manifests: number;
  images: number;
  items: number;
  related_entities: number;
  units: number;
  years: Record<string, number>;
}

export interface AgencyReport {
  id: string;
  title: string;
  consignments: number;
  iiif_manifests: number;
  images: number;
  items: number;
  series: string[];
  units: number;
  years: Record<string, number>;
}

export interface StatsReport {
  overall: OverallReport;
  series: SeriesReport[];
  agencies?: AgencyReport[];
}
