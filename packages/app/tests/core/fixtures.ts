import * as Option from "effect/Option"

import type { Decodable, Decoder, Json } from "../../src/index.js"
import {
  array,
  chain,
  field,
  integer,
  lazy,
  lift2,
  lift3,
  lift5,
  literal,
  map,
  number,
  optional,
  required,
  requiredArray,
  requiredDictionary,
  string,
  withDefault
} from "../../src/index.js"

export interface Comment {
  readonly author: string
  readonly text: string
}

export const Comment: Decodable<Comment> = {
  decode: (json) =>
    lift2((author: string, text: string): Comment => ({ author, text }))(
      required(json, "author", string),
      required(json, "text", string)
    )
}

export interface Post {
  readonly id: number
  readonly title: string
  readonly nickname: Option.Option<string>
  readonly tags: ReadonlyArray<string>
  readonly comments: ReadonlyArray<Comment>
}

export const Post: Decodable<Post> = {
  decode: (json) =>
    lift5((
      id: number,
      title: string,
      nickname: Option.Option<string>,
      tags: ReadonlyArray<string>,
      comments: ReadonlyArray<Comment>
    ): Post => ({ id, title, nickname, tags, comments }))(
      required(json, "id", integer),
      required(json, "title", string),
      optional(json, "nickname", string),
      withDefault("tags", array(string), [])(json),
      requiredArray(json, "comments", Comment)
    )
}

export interface Feed {
  readonly name: string
  readonly posts: ReadonlyArray<Post>
  readonly stats: Readonly<Record<string, number>>
}

export const Feed: Decodable<Feed> = {
  decode: (json) =>
    lift3((name: string, posts: ReadonlyArray<Post>, stats: Readonly<Record<string, number>>): Feed => ({
      name,
      posts,
      stats
    }))(
      required(json, "name", string),
      requiredArray(json, "posts", Post),
      requiredDictionary(json, "stats", number)
    )
}

export const encodeComment = (comment: Comment): Json => ({ author: comment.author, text: comment.text })

export const encodePost = (post: Post): Json => ({
  id: post.id,
  title: post.title,
  nickname: Option.getOrNull(post.nickname),
  tags: post.tags,
  comments: post.comments.map(encodeComment)
})

export const encodeFeed = (feed: Feed): Json => ({
  name: feed.name,
  posts: feed.posts.map(encodePost),
  stats: feed.stats
})

export interface Person {
  readonly name: string
  readonly age: number
}

export const decodePerson = (json: Json, aggregation?: "fail-fast" | "accumulate-all") =>
  lift2((name: string, age: number): Person => ({ name, age }), aggregation)(
    required(json, "name", string),
    required(json, "age", integer)
  )

export interface Nickname {
  readonly nickname: Option.Option<string>
}

export const Nickname: Decodable<Nickname> = {
  decode: (json) => map(optional(json, "nickname", string), (nickname): Nickname => ({ nickname }))
}

// Recursive: a category holds sub-categories of the same type.
export interface Category {
  readonly name: string
  readonly children: ReadonlyArray<Category>
}

export const Category: Decodable<Category> = {
  decode: (json) =>
    lift2((name: string, children: ReadonlyArray<Category>): Category => ({ name, children }))(
      required(json, "name", string),
      withDefault("children", array(lazy(() => Category)), [])(json)
    )
}

export type Shape =
  | { readonly kind: "circle"; readonly radius: number }
  | { readonly kind: "rect"; readonly width: number; readonly height: number }

const circle: Decoder<Shape> = (json) =>
  map(required(json, "radius", number), (radius): Shape => ({ kind: "circle", radius }))

const rect: Decoder<Shape> = (json) =>
  lift2((width: number, height: number): Shape => ({ kind: "rect", width, height }))(
    required(json, "width", number),
    required(json, "height", number)
  )

export const Shape: Decoder<Shape> = chain(field("kind", literal("circle", "rect")), (kind) =>
  kind === "circle" ? circle : rect)
