export enum TravelMode {
  FLIGHT = 'flight',
  TRAIN = 'train',
  OWN_VEHICLE = 'own_vehicle',
  SHIP = 'ship',
}
