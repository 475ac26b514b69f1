export const routes = [
  { screen_name: "ProfileScreen" },
  { screen_name: "MissingScreen" },
];

export const open = (screen_name: string) => ({ screen_name });
