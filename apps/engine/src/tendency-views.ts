/**
 * Tendency Views
 *
 * Top-level composition over a loaded dataset: one call per team view,
 * returning the scorecard, breakdown tables and league ranks the
 * presentation layer renders.
 */

import { FilterOptions, getFilterOptions } from './filters/filter-options';
import { filterPlays, playsAgainstPersonnel, SituationalFilter } from './filters/situational-filter';
import { PlayDataset } from './dataset';
import {
  allTeamsDefense,
  allTeamsOffense,
  DefenseMetric,
  DefenseTeamRow,
  OffenseMetric,
  OffenseTeamRow,
  rankTeamMetric,
} from './rankings/league-rankings';
import { DefenseCategoryRow, defenseByCategory, defenseOverall, DefenseOverall } from './tendencies/defense';
import { OffenseCategoryRow, offenseByCategory, offenseOverall, OffenseOverall } from './tendencies/offense';

export const DEFAULT_VERSUS_PERSONNEL = '11';

export interface OffenseView {
  team: string;
  overall: OffenseOverall;
  ranks: Record<OffenseMetric, string>;
  personnel: OffenseCategoryRow[];
  formation: OffenseCategoryRow[];
  qbAlignment: OffenseCategoryRow[];
  league: OffenseTeamRow[];
}

export interface VersusPersonnelTable {
  personnel: string;
  packages: DefenseCategoryRow[];
}

export interface DefenseView {
  team: string;
  overall: DefenseOverall;
  ranks: Record<DefenseMetric, string>;
  packages: DefenseCategoryRow[];
  versusPersonnel: VersusPersonnelTable | null;
  league: DefenseTeamRow[];
}

export interface DefenseViewOptions {
  /**
   * Offensive personnel group for the package-vs-personnel table.
   * Undefined picks "11" when present (else the first group); null skips it.
   */
  versusPersonnel?: string | null;
}

export class TendencyEngine {
  private options: FilterOptions | null = null;

  constructor(private readonly dataset: PlayDataset) {}

  filterOptions(): FilterOptions {
    if (!this.options) {
      this.options = getFilterOptions(this.dataset.plays);
    }
    return this.options;
  }

  offenseView(team: string, filters: SituationalFilter = {}): OffenseView {
    const topN = this.dataset.topN;
    const plays = filterPlays(this.dataset.plays, { ...filters, team }, 'offense');
    const league = allTeamsOffense(this.dataset.plays, filters);

    return {
      team,
      overall: offenseOverall(plays, topN),
      ranks: {
        runPct: rankTeamMetric(team, 'runPct', league),
        paPct: rankTeamMetric(team, 'paPct', league),
        dbPct: rankTeamMetric(team, 'dbPct', league),
        motionPct: rankTeamMetric(team, 'motionPct', league),
      },
      personnel: offenseByCategory(plays, 'personnel', topN),
      formation: offenseByCategory(plays, 'formation', topN),
      qbAlignment: offenseByCategory(plays, 'qbAlignment', topN),
      league,
    };
  }

  defenseView(team: string, filters: SituationalFilter = {}, options: DefenseViewOptions = {}): DefenseView {
    const topN = this.dataset.topN;
    const plays = filterPlays(this.dataset.plays, { ...filters, team }, 'defense');
    const league = allTeamsDefense(this.dataset.plays, filters);

    return {
      team,
      overall: defenseOverall(plays, topN),
      ranks: {
        blitzPct: rankTeamMetric(team, 'blitzPct', league),
        manPct: rankTeamMetric(team, 'manPct', league),
        mofoPct: rankTeamMetric(team, 'mofoPct', league),
        disguisePct: rankTeamMetric(team, 'disguisePct', league),
      },
      packages: defenseByCategory(plays, 'defPackage', topN),
      versusPersonnel: this.versusPersonnelTable(plays, options.versusPersonnel, topN),
      league,
    };
  }

  private versusPersonnelTable(
    defensePlays: PlayDataset['plays'],
    requested: string | null | undefined,
    topN: number
  ): VersusPersonnelTable | null {
    if (requested === null) return null;

    const faced = [...new Set(defensePlays.map(p => p.personnel).filter((p): p is string => p !== null))].sort();
    const personnel = requested ?? (faced.includes(DEFAULT_VERSUS_PERSONNEL) ? DEFAULT_VERSUS_PERSONNEL : faced[0]);
    if (personnel === undefined) return null;

    return {
      personnel,
      packages: defenseByCategory(playsAgainstPersonnel(defensePlays, personnel), 'defPackage', topN),
    };
  }
}
