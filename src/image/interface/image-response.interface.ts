export interface PropertyImageView {
  id: number;
  image: string;
  caption: string | null;
  is_primary: boolean;
}
