/** Tags stamped on every persisted point so dashboards can filter by origin. */
export interface PointTags {
  dataSource: string;
  gridSection: string;
}
