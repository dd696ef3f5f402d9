/** A miniature COCO-Text index: three train images, one val image. */
const box = (x: number, y: number, w: number, h: number) => [x, y, x + w, y, x + w, y + h, x, y + h];

export const cocoIndex = {
  imgs: {
    "3": { id: 3, set: "train", file_name: "c3.jpg" },
    "1": { id: 1, set: "train", file_name: "c1.jpg" },
    "2": { id: 2, set: "val", file_name: "c2.jpg" },
    "10": { id: 10, set: "train", file_name: "c10.jpg" },
  },
  imgToAnns: { "1": [11, 12], "2": [21], "3": [31, 32], "10": [] },
  anns: {
    "11": { id: 11, image_id: 1, mask: box(0, 0, 10, 5), utf8_string: "hello", language: "english", legibility: "legible" },
    "12": { id: 12, image_id: 1, mask: box(20, 0, 8, 4), utf8_string: "bonjour", language: "not english", legibility: "legible" },
    "21": { id: 21, image_id: 2, mask: box(1, 1, 4, 2), utf8_string: "val", language: "english", legibility: "legible" },
    "31": { id: 31, image_id: 3, mask: box(5, 5, 6, 3), utf8_string: "blur", language: "english", legibility: "illegible" },
    "32": { id: 32, image_id: 3, mask: box(5, 9, 6, 3), language: "english", legibility: "illegible" },
  },
};
