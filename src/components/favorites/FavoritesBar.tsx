import { useFavorites } from '../../api/hooks/useSettings'

export function FavoritesBar() {
  const { data: favorites } = useFavorites()

  if (!favorites?.length) return null

  return (
    <nav className="flex flex-wrap gap-2" aria-label="Favorites">
      {favorites.map((favorite) => (
        <a
          key={favorite.url}
          href={favorite.url}
          target="_blank"
          rel="noopener noreferrer"
          className="dock-panel flex items-center gap-2 px-3 py-1.5 hover:border-dock-accent transition-colors"
        >
          <span aria-hidden="true">{favorite.icon}</span>
          <span>{favorite.name || favorite.url.replace(/^https?:\/\//, '')}</span>
        </a>
      ))}
    </nav>
  )
}
