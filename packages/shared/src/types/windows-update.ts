export interface WindowsUpdate {
  kb_id: string;
  title: string;
  installed_on: string | null;
  status: string;
}

/**
 * A Windows update as exposed by the read-only update endpoints,
 * carrying its identifier and the host it was reported by
 */
export interface WindowsUpdateRecord extends WindowsUpdate {
  id: number;
  asset_info_id: number;
  hostname: string;
}

export interface WindowsUpdateFilters {
  kbId?: string;
  title?: string;
  installedOnGte?: string;
  installedOnLte?: string;
  status?: string;
}
