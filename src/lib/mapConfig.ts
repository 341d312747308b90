export const MAP_DEFAULTS = {
  zoom: 6,
  height: 700,
  markerRadius: 5,
  markerFillOpacity: 0.7,
  popupMaxWidth: 300,
};

export const BASE_LAYER = {
  name: 'OpenStreetMap',
  url: 'https://{s}.tile.openstreetmap.org/{z}/{x}/{y}.png',
  attribution: '&copy; <a href="https://www.openstreetmap.org/copyright">OpenStreetMap</a> contributors',
};

export const GEOLOGY_LAYER = {
  name: 'Geological map (Macrostrat)',
  url: 'https://tiles.macrostrat.org/carto/{z}/{x}/{y}.png',
  attribution: 'Macrostrat',
  opacity: 0.6,
};
